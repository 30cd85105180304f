// backend/src/middleware/coach-access.middleware.ts
import { Request, Response, NextFunction } from 'express';

/**
 * Lets a request through to the coach routes when `?coach=` equals the shared token.
 *
 * This is NOT authentication. The token travels in the URL, never expires and
 * is the same for every coach; it only keeps respondents from stumbling onto
 * other people's results.
 */
export const requireCoachAccess = (expectedToken: string | undefined) => {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedToken) {
      console.error('[Coach] COACH_ACCESS_TOKEN is not defined!');
      return res.status(500).send({ message: 'Server configuration error.' });
    }

    const provided = req.query.coach;
    if (typeof provided !== 'string' || provided !== expectedToken) {
      console.warn(`[Coach] Rejected ${req.method} ${req.path}: missing or wrong access token.`);
      return res.status(403).send({ message: 'Coach access denied.' });
    }

    next();
  };
};
