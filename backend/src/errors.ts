// backend/src/errors.ts

/**
 * Base class for every failure the API knows how to report.
 * `statusCode` is what the route layer sends back; `details` is merged into the JSON body.
 */
export class AssessmentError extends Error {
  readonly statusCode: number;
  readonly details: Record<string, unknown>;

  constructor(message: string, statusCode: number, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/** Missing required intake fields, or an answer outside the questionnaire. */
export class ValidationError extends AssessmentError {
  readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super(message, 400, { fields });
    this.fields = fields;
  }
}

/** The record directory could not be created, written or read. Safe to retry. */
export class StorageUnavailableError extends AssessmentError {
  constructor(message: string, readonly reason?: unknown) {
    super(message, 503, { retryable: true });
  }
}

export class NotFoundError extends AssessmentError {
  constructor(message: string) {
    super(message, 404);
  }
}

/** A stored file that is not valid JSON or does not match the record layout. */
export class MalformedRecordError extends AssessmentError {
  constructor(readonly fileName: string, reason: string) {
    super(`Malformed assessment record ${fileName}: ${reason}`, 500);
  }
}

export class InvalidTransitionError extends AssessmentError {
  constructor(state: string, action: string) {
    super(`Cannot ${action.replace(/_/g, ' ')} while the assessment is ${state.replace(/_/g, ' ')}.`, 409, {
      state,
      action,
    });
  }
}

export class IncompleteAssessmentError extends AssessmentError {
  constructor(readonly unanswered: number) {
    super(`Please answer all questions before completing the assessment (${unanswered} remaining).`, 409, {
      unanswered,
    });
  }
}

// Only reachable through a programming mistake: every id the app handles comes from the catalog.
export class UnknownDimensionError extends AssessmentError {
  constructor(dimensionId: string) {
    super(`Unknown dimension "${dimensionId}"`, 500);
  }
}
