import { AxiosHeaders, type AxiosResponse } from 'axios';
import type { AssessmentEvaluation, Catalog, QuestionEntry, StoredAssessment } from '../src/types/assessment';

export const ok = <T>(data: T): AxiosResponse<T> => ({
  data,
  status: 200,
  statusText: 'OK',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

/** Shaped like a rejected axios request carrying the backend error body. */
export const apiFailure = (status: number, data: Record<string, unknown>) => ({
  isAxiosError: true,
  message: `Request failed with status code ${status}`,
  response: { status, data },
});

export const catalog: Catalog = {
  dimensions: [
    {
      id: 'purpose_vision',
      title: 'Purpose & Vision',
      statements: [
        { id: 'vision', text: 'I communicate a clear vision.' },
        { id: 'values', text: 'I act on my values.' },
      ],
    },
  ],
  ratingScale: [
    { value: 1, label: '1 - Never' },
    { value: 10, label: '10 - Always' },
  ],
};

export const questions: QuestionEntry[] = [
  { position: 1, dimensionId: 'purpose_vision', statementId: 'values', text: 'I act on my values.' },
  { position: 2, dimensionId: 'purpose_vision', statementId: 'vision', text: 'I communicate a clear vision.' },
];

export const evaluation: AssessmentEvaluation = {
  dimensionScores: { purpose_vision: 17 },
  results: [
    {
      dimensionId: 'purpose_vision',
      title: 'Purpose & Vision',
      total: 17,
      maxTotal: 60,
      band: 'low',
      interpretation: 'Placeholder interpretation.',
      development: 'Placeholder development focus.',
      statements: [
        { statementId: 'vision', text: 'I communicate a clear vision.', rating: 9 },
        { statementId: 'values', text: 'I act on my values.', rating: 8 },
      ],
    },
  ],
};

export const storedAssessment = (id: string, name: string): StoredAssessment => ({
  id,
  coachee_name: name,
  coachee_email: `${id}@example.com`,
  coachee_phone: '',
  assessment_start: '2026-10-19T14:10:00.000Z',
  completion_time: '2026-10-19T14:30:00.000Z',
  scores: { purpose_vision: { vision: 9, values: 8 } },
  dimension_scores: { purpose_vision: 17 },
  evaluation,
});
