// backend/src/types/assessment.ts

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

export const INTERPRETATION_BANDS = ['high', 'medium_high', 'medium', 'medium_low', 'low'] as const;
export type InterpretationBand = (typeof INTERPRETATION_BANDS)[number];

export interface BandText {
  interpretation: string;
  development: string;
}

// dimension id -> statement id -> rating (1-10)
export type ScoreMap = Record<string, Record<string, number>>;
export type DimensionScores = Record<string, number>;

export interface QuestionEntry {
  position: number;
  dimensionId: string;
  statementId: string;
  text: string;
}

export type QuestionSequence = QuestionEntry[];

export interface Respondent {
  name: string;
  email: string;
  phone: string;
}

/** The persisted unit. Field names match the on-disk layout. */
export interface AssessmentRecord {
  coachee_name: string;
  coachee_email: string;
  coachee_phone: string;
  assessment_start: string;
  completion_time?: string;
  scores: ScoreMap;
  dimension_scores?: DimensionScores;
}

export interface StoredAssessment extends AssessmentRecord {
  id: string;
  dimension_scores: DimensionScores;
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
  dimensionScores: DimensionScores;
  results: DimensionResult[];
}
