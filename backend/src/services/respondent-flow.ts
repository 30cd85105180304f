// backend/src/services/respondent-flow.ts
import { z } from 'zod';
import { InvalidTransitionError, ValidationError } from '../errors';
import type { QuestionSequence, Respondent, ScoreMap } from '../types/assessment';

export type FlowState = 'welcome' | 'intake' | 'in_progress' | 'complete';

/** Everything one respondent session owns. Never shared between sessions. */
export interface SessionContext {
  sessionId: string;
  state: FlowState;
  respondent: Respondent | null;
  assessmentStart: string | null;
  sequence: QuestionSequence;
  scores: ScoreMap;
  recordId: string | null;
  completionTime: string | null;
}

export interface IntakeInput {
  name?: unknown;
  email?: unknown;
  phone?: unknown;
}

export type FlowAction =
  | { type: 'open_intake' }
  | { type: 'submit_intake'; intake: IntakeInput; startedAt: string; sequence: QuestionSequence }
  | { type: 'answer'; position: number; rating: number }
  | { type: 'complete'; recordId: string; completionTime: string };

const requiredText = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim() : ''),
  z.string().min(1)
);

const IntakeSchema = z.object({
  name: requiredText,
  email: requiredText,
  phone: z.preprocess((value) => (typeof value === 'string' ? value.trim() : ''), z.string()),
});

const RatingSchema = z.number().int().min(1).max(10);

export const createContext = (sessionId: string): SessionContext => ({
  sessionId,
  state: 'welcome',
  respondent: null,
  assessmentStart: null,
  sequence: [],
  scores: {},
  recordId: null,
  completionTime: null,
});

export const parseIntake = (intake: IntakeInput): Respondent => {
  const parsed = IntakeSchema.safeParse(intake);
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    throw new ValidationError('Please fill in all required fields marked with *', fields);
  }
  return parsed.data;
};

export const unansweredCount = (context: SessionContext): number =>
  context.sequence.filter((q) => context.scores[q.dimensionId]?.[q.statementId] === undefined).length;

const expectState = (context: SessionContext, expected: FlowState, action: FlowAction['type']) => {
  if (context.state !== expected) throw new InvalidTransitionError(context.state, action);
};

/**
 * welcome -> intake -> in_progress (answer*) -> complete.
 * Returns a new context; the input is never modified, so a rejected action leaves no trace.
 */
export const transition = (context: SessionContext, action: FlowAction): SessionContext => {
  switch (action.type) {
    case 'open_intake':
      expectState(context, 'welcome', action.type);
      return { ...context, state: 'intake' };

    case 'submit_intake': {
      expectState(context, 'intake', action.type);
      const respondent = parseIntake(action.intake);
      return {
        ...context,
        state: 'in_progress',
        respondent,
        assessmentStart: action.startedAt,
        sequence: action.sequence,
        scores: {},
      };
    }

    case 'answer': {
      expectState(context, 'in_progress', action.type);
      const question = context.sequence.find((q) => q.position === action.position);
      if (!question) {
        throw new ValidationError(`Question ${action.position} does not exist.`, ['position']);
      }
      if (!RatingSchema.safeParse(action.rating).success) {
        throw new ValidationError('Ratings must be whole numbers from 1 to 10.', ['rating']);
      }
      const previous = context.scores[question.dimensionId] ?? {};
      return {
        ...context,
        scores: {
          ...context.scores,
          [question.dimensionId]: { ...previous, [question.statementId]: action.rating },
        },
      };
    }

    case 'complete':
      expectState(context, 'in_progress', action.type);
      return { ...context, state: 'complete', recordId: action.recordId, completionTime: action.completionTime };
  }
};
