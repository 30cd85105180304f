// frontend/src/state/assessmentStore.ts
import { create } from 'zustand';
import apiService, { toApiError } from '../services/apiService';
import type {
  ApiErrorInfo,
  AssessmentEvaluation,
  Catalog,
  CompletionResult,
  FlowState,
  IntakeForm,
  QuestionEntry,
  ScoreMap,
  SessionSnapshot,
} from '../types/assessment';

interface AssessmentState {
  catalog: Catalog | null;
  sessionId: string | null;
  state: FlowState;
  questions: QuestionEntry[];
  scores: ScoreMap;
  currentIndex: number;
  evaluation: AssessmentEvaluation | null;
  recordId: string | null;
  error: ApiErrorInfo | null;
  isSubmitting: boolean;
  /** Answer requests not yet confirmed by the server. */
  pendingAnswers: number;

  startSession: () => Promise<void>;
  submitIntake: (form: IntakeForm) => Promise<boolean>;
  answer: (rating: number) => Promise<void>;
  goTo: (index: number) => void;
  complete: () => Promise<boolean>;
  reset: () => void;
}

type AssessmentData = Omit<
  AssessmentState,
  'startSession' | 'submitIntake' | 'answer' | 'goTo' | 'complete' | 'reset'
>;

const initialState: AssessmentData = {
  catalog: null,
  sessionId: null,
  state: 'welcome',
  questions: [],
  scores: {},
  currentIndex: 0,
  evaluation: null,
  recordId: null,
  error: null,
  isSubmitting: false,
  pendingAnswers: 0,
};

export const ratingFor = (scores: ScoreMap, question: QuestionEntry): number | undefined =>
  scores[question.dimensionId]?.[question.statementId];

export const answeredCount = (scores: ScoreMap, questions: QuestionEntry[]): number =>
  questions.filter((q) => ratingFor(scores, q) !== undefined).length;

export const statementCount = (catalog: Catalog): number =>
  catalog.dimensions.reduce((total, d) => total + d.statements.length, 0);

export const useAssessmentStore = create<AssessmentState>((set, get) => ({
  ...initialState,

  startSession: async () => {
    set({ ...initialState, isSubmitting: true });
    try {
      const [catalogResponse, sessionResponse] = await Promise.all([
        apiService.get<Catalog>('/catalog'),
        apiService.post<{ sessionId: string; state: FlowState }>('/sessions'),
      ]);
      set({
        catalog: catalogResponse.data,
        sessionId: sessionResponse.data.sessionId,
        state: sessionResponse.data.state,
      });
    } catch (error) {
      console.error('Failed to start assessment session:', error);
      set({ error: toApiError(error, 'Could not start the assessment. Please reload the page.') });
    } finally {
      set({ isSubmitting: false });
    }
  },

  submitIntake: async (form) => {
    const { sessionId } = get();
    if (!sessionId) return false;

    set({ isSubmitting: true, error: null });
    try {
      const response = await apiService.post<SessionSnapshot>(`/sessions/${sessionId}/intake`, form);
      set({
        state: response.data.state,
        questions: response.data.questions,
        scores: response.data.scores,
        currentIndex: 0,
      });
      return true;
    } catch (error) {
      set({ error: toApiError(error, 'Could not save your details. Please try again.') });
      return false;
    } finally {
      set({ isSubmitting: false });
    }
  },

  answer: async (rating) => {
    const { sessionId, questions, currentIndex } = get();
    const question = questions[currentIndex];
    if (!sessionId || !question) return;

    set((state) => ({ pendingAnswers: state.pendingAnswers + 1 }));
    try {
      const response = await apiService.put<SessionSnapshot>(
        `/sessions/${sessionId}/answers/${question.position}`,
        { rating }
      );
      set({ scores: response.data.scores, error: null });
    } catch (error) {
      console.error('Failed to record answer:', error);
      set({ error: toApiError(error, 'Your answer could not be saved. Please try again.') });
    } finally {
      set((state) => ({ pendingAnswers: state.pendingAnswers - 1 }));
    }
  },

  goTo: (index) => {
    const { questions } = get();
    if (questions.length === 0) return;
    set({ currentIndex: Math.min(Math.max(index, 0), questions.length - 1) });
  },

  complete: async () => {
    const { sessionId, pendingAnswers } = get();
    // The saved record must include every answer already sent.
    if (!sessionId || pendingAnswers > 0) return false;

    set({ isSubmitting: true, error: null });
    try {
      const response = await apiService.post<CompletionResult>(`/sessions/${sessionId}/complete`);
      set({
        state: 'complete',
        recordId: response.data.recordId,
        evaluation: response.data.evaluation,
      });
      return true;
    } catch (error) {
      // Answers stay in place so the respondent can retry.
      set({ error: toApiError(error, 'Your assessment could not be saved. Please try again.') });
      return false;
    } finally {
      set({ isSubmitting: false });
    }
  },

  reset: () => set({ ...initialState }),
}));
