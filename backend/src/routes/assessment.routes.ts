// backend/src/routes/assessment.routes.ts
import { Router } from 'express';
import { sendError } from '../middleware/error-response';
import type { CompetencyCatalog } from '../services/catalog-service';
import type { SessionService } from '../services/session-service';

interface AssessmentRouterDeps {
  catalog: CompetencyCatalog;
  sessions: SessionService;
}

/** Respondent-facing routes: the catalog and the questionnaire session. */
export const createAssessmentRouter = ({ catalog, sessions }: AssessmentRouterDeps) => {
  const router = Router();

  router.get('/catalog', (req, res) => {
    res.status(200).json({
      dimensions: catalog.allDimensions(),
      ratingScale: catalog.ratingScale(),
    });
  });

  /**
   * Opening the welcome page starts a session; it goes straight to the intake form.
   */
  router.post('/sessions', (req, res) => {
    try {
      const session = sessions.create();
      res.status(201).json({ sessionId: session.sessionId, state: session.state });
    } catch (error) {
      sendError(res, error, 'Error starting session');
    }
  });

  router.get('/sessions/:sessionId', (req, res) => {
    try {
      res.status(200).json(sessions.get(req.params.sessionId));
    } catch (error) {
      sendError(res, error, 'Error fetching session');
    }
  });

  router.post('/sessions/:sessionId/intake', (req, res) => {
    const { name, email, phone } = req.body ?? {};
    try {
      res.status(200).json(sessions.submitIntake(req.params.sessionId, { name, email, phone }));
    } catch (error) {
      sendError(res, error, 'Error submitting intake');
    }
  });

  router.put('/sessions/:sessionId/answers/:position', (req, res) => {
    const position = Number(req.params.position);
    const rating = req.body?.rating;

    if (!Number.isInteger(position)) {
      return res.status(400).send({ message: 'Question position must be a whole number.', fields: ['position'] });
    }
    if (typeof rating !== 'number') {
      return res.status(400).send({ message: 'A rating from 1 to 10 is required.', fields: ['rating'] });
    }

    try {
      res.status(200).json(sessions.answer(req.params.sessionId, position, rating));
    } catch (error) {
      sendError(res, error, 'Error recording answer');
    }
  });

  router.post('/sessions/:sessionId/complete', async (req, res) => {
    try {
      const result = await sessions.complete(req.params.sessionId);
      res.status(201).json(result);
    } catch (error) {
      sendError(res, error, 'Error completing assessment');
    }
  });

  return router;
};
