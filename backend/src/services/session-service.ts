// backend/src/services/session-service.ts
import { v4 as uuidv4 } from 'uuid';
import { IncompleteAssessmentError, InvalidTransitionError, NotFoundError } from '../errors';
import { generateSequence } from './question-sequencer';
import { countAnswered, evaluate } from './scoring-service';
import { createContext, transition, unansweredCount, type IntakeInput, type SessionContext } from './respondent-flow';
import type { AssessmentStore } from './assessment-store';
import type { CompetencyCatalog } from './catalog-service';
import type { AssessmentEvaluation, AssessmentRecord, QuestionSequence, Respondent, ScoreMap } from '../types/assessment';

export interface SessionServiceOptions {
  allowPartialCompletion: boolean;
  /** Sessions untouched for longer than this are dropped. */
  idleTimeoutMs: number;
  now?: () => Date;
}

interface SessionEntry {
  context: SessionContext;
  lastActivity: number;
}

export interface SessionSnapshot {
  sessionId: string;
  state: SessionContext['state'];
  respondent: Respondent | null;
  assessmentStart: string | null;
  questions: QuestionSequence;
  scores: ScoreMap;
  answeredCount: number;
  totalQuestions: number;
}

export interface CompletionResult {
  recordId: string;
  completionTime: string;
  evaluation: AssessmentEvaluation;
}

/**
 * Holds one context per respondent session and drives it through the flow.
 * A session is dropped as soon as its record has been written, or once it has
 * been idle for `idleTimeoutMs`. Expired sessions are swept whenever a new one
 * is created; there is no background timer.
 */
export class SessionService {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly saving = new Set<string>();
  private readonly now: () => Date;

  constructor(
    private readonly catalog: CompetencyCatalog,
    private readonly store: AssessmentStore,
    private readonly options: SessionServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get activeCount(): number {
    return this.sessions.size;
  }

  /** A new session, already past the welcome page. */
  create(): SessionSnapshot {
    this.evictIdle();
    const context = transition(createContext(uuidv4()), { type: 'open_intake' });
    this.remember(context);
    console.log(`[Session] Started ${context.sessionId}`);
    return this.snapshot(context);
  }

  get(sessionId: string): SessionSnapshot {
    return this.snapshot(this.context(sessionId));
  }

  submitIntake(sessionId: string, intake: IntakeInput): SessionSnapshot {
    const context = this.context(sessionId);
    this.assertNotSaving(sessionId, 'submit_intake');
    const next = transition(context, {
      type: 'submit_intake',
      intake,
      startedAt: this.now().toISOString(),
      sequence: generateSequence(this.catalog),
    });
    this.remember(next);
    return this.snapshot(next);
  }

  /** Rejected while a save is in flight: the record being written would not include it. */
  answer(sessionId: string, position: number, rating: number): SessionSnapshot {
    const context = this.context(sessionId);
    this.assertNotSaving(sessionId, 'answer');
    const next = transition(context, { type: 'answer', position, rating });
    this.remember(next);
    return this.snapshot(next);
  }

  /**
   * Writes the record and ends the session. If the write fails the session is
   * left exactly as it was so the respondent can retry without losing answers.
   */
  async complete(sessionId: string): Promise<CompletionResult> {
    const context = this.context(sessionId);
    if (context.state !== 'in_progress' || !context.respondent || !context.assessmentStart) {
      throw new InvalidTransitionError(context.state, 'complete');
    }
    this.assertNotSaving(sessionId, 'complete');

    const unanswered = unansweredCount(context);
    if (unanswered > 0 && !this.options.allowPartialCompletion) {
      throw new IncompleteAssessmentError(unanswered);
    }

    const completionTime = this.now().toISOString();
    const record: AssessmentRecord = {
      coachee_name: context.respondent.name,
      coachee_email: context.respondent.email,
      coachee_phone: context.respondent.phone,
      assessment_start: context.assessmentStart,
      completion_time: completionTime,
      scores: context.scores,
    };

    this.saving.add(sessionId);
    let recordId: string;
    try {
      recordId = await this.store.save(record);
    } finally {
      this.saving.delete(sessionId);
    }

    const completed = transition(context, { type: 'complete', recordId, completionTime });
    this.sessions.delete(sessionId);
    console.log(`[Session] Completed ${sessionId} as ${recordId}`);

    return { recordId, completionTime, evaluation: evaluate(this.catalog, completed.scores) };
  }

  private context(sessionId: string): SessionContext {
    const entry = this.sessions.get(sessionId);
    const now = this.now().getTime();
    if (entry && this.isExpired(sessionId, entry, now)) {
      this.sessions.delete(sessionId);
      console.log(`[Session] Expired ${sessionId} after inactivity`);
    } else if (entry) {
      entry.lastActivity = now;
      return entry.context;
    }
    throw new NotFoundError('Assessment session not found. Please start again.');
  }

  private remember(context: SessionContext) {
    this.sessions.set(context.sessionId, { context, lastActivity: this.now().getTime() });
  }

  private assertNotSaving(sessionId: string, action: string) {
    if (this.saving.has(sessionId)) {
      throw new InvalidTransitionError('saving', action);
    }
  }

  // A session whose record is being written is never expired.
  private isExpired(sessionId: string, entry: SessionEntry, now: number): boolean {
    return !this.saving.has(sessionId) && now - entry.lastActivity > this.options.idleTimeoutMs;
  }

  private evictIdle() {
    const now = this.now().getTime();
    let evicted = 0;
    for (const [sessionId, entry] of this.sessions) {
      if (this.isExpired(sessionId, entry, now)) {
        this.sessions.delete(sessionId);
        evicted += 1;
      }
    }
    if (evicted > 0) console.log(`[Session] Expired ${evicted} idle session(s)`);
  }

  private snapshot(context: SessionContext): SessionSnapshot {
    return {
      sessionId: context.sessionId,
      state: context.state,
      respondent: context.respondent,
      assessmentStart: context.assessmentStart,
      questions: context.sequence,
      scores: context.scores,
      answeredCount: countAnswered(context.scores),
      totalQuestions: this.catalog.questionCount,
    };
  }
}
