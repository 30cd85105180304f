// backend/src/middleware/error-response.ts
import { Response } from 'express';
import { AssessmentError } from '../errors';

/**
 * Shared tail of every route's catch block: known errors keep their status and
 * details, anything else is logged and reported as a 500.
 */
export const sendError = (res: Response, error: unknown, context: string) => {
  if (error instanceof AssessmentError) {
    if (error.statusCode >= 500) console.error(`${context}:`, error);
    return res.status(error.statusCode).send({ message: error.message, ...error.details });
  }
  console.error(`${context}:`, error);
  return res.status(500).send({ message: 'Internal server error' });
};
