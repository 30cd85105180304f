// frontend/src/state/coachStore.ts
import { create } from 'zustand';
import apiService, { toApiError } from '../services/apiService';
import type { ApiErrorInfo, StoredAssessment } from '../types/assessment';

// Legacy records without a start time are stored at the Unix epoch.
const recordedTime = (iso: string | undefined): Date | null => {
  if (!iso) return null;
  const time = Date.parse(iso);
  return Number.isNaN(time) || time <= 0 ? null : new Date(time);
};

export const formatAssessmentTime = (iso: string | undefined, timeZone?: string): string =>
  recordedTime(iso)?.toLocaleString('en-US', {
    year: 'numeric',
    month: 'short',
    day: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    timeZone,
  }) ?? 'Not recorded';

/** "Name - Oct 19, 2026", so repeat assessments of one coachee can be told apart. */
export const assessmentTabLabel = (assessment: StoredAssessment, timeZone?: string): string => {
  const started = recordedTime(assessment.assessment_start);
  const date = started
    ? started.toLocaleDateString('en-US', { year: 'numeric', month: 'short', day: 'numeric', timeZone })
    : 'Not recorded';
  return `${assessment.coachee_name} - ${date}`;
};

/** `granted` only after the backend has accepted the token. */
export type CoachAccess = 'idle' | 'checking' | 'granted' | 'denied';

interface CoachState {
  token: string | null;
  access: CoachAccess;
  assessments: StoredAssessment[];
  selectedId: string | null;
  pendingDeleteId: string | null;
  error: ApiErrorInfo | null;

  load: (token: string) => Promise<void>;
  select: (id: string) => void;
  requestDelete: (id: string) => void;
  cancelDelete: () => void;
  confirmDelete: () => Promise<boolean>;
}

export const useCoachStore = create<CoachState>((set, get) => ({
  token: null,
  access: 'idle',
  assessments: [],
  selectedId: null,
  pendingDeleteId: null,
  error: null,

  load: async (token) => {
    set({ token, access: 'checking', error: null });
    try {
      const response = await apiService.get<StoredAssessment[]>('/coach/assessments', { params: { coach: token } });
      const assessments = response.data;
      const { selectedId } = get();
      const stillThere = assessments.some((a) => a.id === selectedId);
      set({
        access: 'granted',
        assessments,
        selectedId: stillThere ? selectedId : assessments[0]?.id ?? null,
      });
    } catch (error) {
      console.warn('Coach view unavailable:', error);
      set({ access: 'denied', assessments: [], selectedId: null, error: toApiError(error, 'Coach view unavailable.') });
    }
  },

  select: (id) => set({ selectedId: id, pendingDeleteId: null }),

  requestDelete: (id) => set({ pendingDeleteId: id }),

  cancelDelete: () => set({ pendingDeleteId: null }),

  confirmDelete: async () => {
    const { token, pendingDeleteId } = get();
    if (!token || !pendingDeleteId) return false;

    try {
      await apiService.delete(`/coach/assessments/${pendingDeleteId}`, { params: { coach: token } });
      const assessments = get().assessments.filter((a) => a.id !== pendingDeleteId);
      set({
        assessments,
        pendingDeleteId: null,
        selectedId: assessments[0]?.id ?? null,
        error: null,
      });
      return true;
    } catch (error) {
      console.error('Failed to delete assessment:', error);
      set({ pendingDeleteId: null, error: toApiError(error, 'Could not delete the assessment.') });
      return false;
    }
  },
}));
