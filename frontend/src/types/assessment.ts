// frontend/src/types/assessment.ts
// Shapes returned by the backend API.

export interface Statement {
  id: string;
  text: string;
}

export interface Dimension {
  id: string;
  title: string;
  statements: Statement[];
}

export interface RatingOption {
  value: number;
  label: string;
}

export interface Catalog {
  dimensions: Dimension[];
  ratingScale: RatingOption[];
}

export type FlowState = 'welcome' | 'intake' | 'in_progress' | 'complete';

export type InterpretationBand = 'high' | 'medium_high' | 'medium' | 'medium_low' | 'low';

/** dimension id -> statement id -> rating (1..10) */
export type ScoreMap = Record<string, Record<string, number>>;

export interface QuestionEntry {
  position: number;
  dimensionId: string;
  statementId: string;
  text: string;
}

export interface Respondent {
  name: string;
  email: string;
  phone: string;
}

export interface IntakeForm {
  name: string;
  email: string;
  phone: string;
}

export interface SessionSnapshot {
  sessionId: string;
  state: FlowState;
  respondent: Respondent | null;
  assessmentStart: string | null;
  questions: QuestionEntry[];
  scores: ScoreMap;
  answeredCount: number;
  totalQuestions: number;
}

export interface StatementResult {
  statementId: string;
  text: string;
  rating: number | null;
}

export interface DimensionResult {
  dimensionId: string;
  title: string;
  total: number;
  maxTotal: number;
  band: InterpretationBand;
  interpretation: string;
  development: string;
  statements: StatementResult[];
}

export interface AssessmentEvaluation {
  dimensionScores: Record<string, number>;
  results: DimensionResult[];
}

export interface CompletionResult {
  recordId: string;
  completionTime: string;
  evaluation: AssessmentEvaluation;
}

export interface StoredAssessment {
  id: string;
  coachee_name: string;
  coachee_email: string;
  coachee_phone: string;
  assessment_start: string;
  completion_time?: string;
  scores: ScoreMap;
  dimension_scores: Record<string, number>;
  evaluation: AssessmentEvaluation;
}

/** Error body the API sends: `{ message, ...details }`. */
export interface ApiErrorInfo {
  message: string;
  status?: number;
  fields?: string[];
  retryable?: boolean;
  unanswered?: number;
}
