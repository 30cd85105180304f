// frontend/src/pages/CompletePage.tsx
import { useState } from 'react';
import DimensionBreakdown from '../components/DimensionBreakdown';
import LoadingButton from '../components/LoadingButton';
import RadarChart from '../components/RadarChart';
import ScoreBar from '../components/ScoreBar';
import { useAssessmentStore } from '../state/assessmentStore';

export default function CompletePage() {
  const evaluation = useAssessmentStore((state) => state.evaluation);
  const startSession = useAssessmentStore((state) => state.startSession);
  const [openDimension, setOpenDimension] = useState<string | null>(null);

  if (!evaluation) return null;

  return (
    <div className="space-y-6">
      <section className="rounded-lg bg-bg-light border border-border p-6">
        <h2 className="text-xl font-bold text-text-primary">Thank you for completing the assessment</h2>
        <p className="text-sm text-text-secondary mt-2">
          Your responses have been saved and shared with your coach. Here is your leadership profile.
        </p>
      </section>

      <section className="rounded-lg bg-bg-light border border-border p-6">
        <RadarChart results={evaluation.results} />
      </section>

      <section className="rounded-lg bg-bg-light border border-border p-6 space-y-3">
        <h3 className="text-base font-semibold text-text-primary">Scores by dimension</h3>
        {evaluation.results.map((result) => (
          <ScoreBar
            key={result.dimensionId}
            title={result.title}
            total={result.total}
            maxTotal={result.maxTotal}
            band={result.band}
          />
        ))}
      </section>

      <section className="rounded-lg bg-bg-light border border-border divide-y divide-border">
        {evaluation.results.map((result) => (
          <div key={result.dimensionId} className="p-4">
            <button
              className="w-full text-left text-sm font-semibold text-text-primary"
              onClick={() => setOpenDimension(openDimension === result.dimensionId ? null : result.dimensionId)}
            >
              {result.title}
            </button>
            {openDimension === result.dimensionId && (
              <div className="mt-4">
                <DimensionBreakdown result={result} />
              </div>
            )}
          </div>
        ))}
      </section>

      <section className="rounded-lg bg-bg-light border border-border p-6 space-y-2">
        <h3 className="text-base font-semibold text-text-primary">Next steps</h3>
        <ul className="list-disc pl-5 text-sm text-text-secondary space-y-1">
          <li>Review the dimensions with the lowest scores and note one concrete behaviour to practise.</li>
          <li>Bring this profile to your next coaching session.</li>
          <li>Ask a colleague whether your ratings match what they see.</li>
        </ul>
        <LoadingButton variant="secondary" className="mt-4" onClick={() => void startSession()}>
          Start a new assessment
        </LoadingButton>
      </section>
    </div>
  );
}
