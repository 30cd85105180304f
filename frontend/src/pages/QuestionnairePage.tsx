// frontend/src/pages/QuestionnairePage.tsx
import LoadingButton from '../components/LoadingButton';
import { answeredCount, ratingFor, useAssessmentStore } from '../state/assessmentStore';

export default function QuestionnairePage() {
  const {
    catalog,
    questions,
    scores,
    currentIndex,
    error,
    isSubmitting,
    pendingAnswers,
    answer,
    goTo,
    complete,
  } = useAssessmentStore();

  const question = questions[currentIndex];
  if (!question) return null;

  const answered = answeredCount(scores, questions);
  const current = ratingFor(scores, question);
  const isLast = currentIndex === questions.length - 1;
  const progress = Math.round((answered / questions.length) * 100);

  return (
    <div className="space-y-6">
      <div>
        <div className="flex justify-between text-sm text-text-secondary mb-1">
          <span>
            Question {question.position} of {questions.length}
          </span>
          <span>{answered} answered</span>
        </div>
        <div className="h-2 w-full rounded-full bg-bg-light border border-border">
          <div className="h-full rounded-full bg-primary" style={{ width: `${progress}%` }} />
        </div>
      </div>

      <section className="rounded-lg bg-bg-light border border-border p-6 space-y-4">
        <p className="text-lg text-text-primary">{question.text}</p>
        <label htmlFor="rating" className="block text-sm font-medium text-text-secondary">
          How well does this describe you?
        </label>
        <select
          id="rating"
          className="w-full rounded-md border border-border px-3 py-2 bg-white text-sm text-text-primary"
          value={current ?? ''}
          onChange={(e) => void answer(Number(e.target.value))}
        >
          <option value="" disabled>
            Select a rating
          </option>
          {(catalog?.ratingScale ?? []).map((option) => (
            <option key={option.value} value={option.value}>
              {option.label}
            </option>
          ))}
        </select>
      </section>

      {error && (
        <div className="rounded-md border border-error bg-red-50 px-4 py-3 text-sm text-error">
          {error.message}
          {error.retryable && ' Your answers are still here.'}
        </div>
      )}

      <div className="flex justify-between">
        <LoadingButton variant="secondary" onClick={() => goTo(currentIndex - 1)} disabled={currentIndex === 0}>
          Previous
        </LoadingButton>
        {isLast ? (
          <LoadingButton
            onClick={() => void complete()}
            isLoading={isSubmitting}
            disabled={pendingAnswers > 0}
            loadingText="Saving..."
          >
            Finish Assessment
          </LoadingButton>
        ) : (
          <LoadingButton onClick={() => goTo(currentIndex + 1)}>Next</LoadingButton>
        )}
      </div>
    </div>
  );
}
