// backend/src/routes/coach.routes.ts
import { Router } from 'express';
import { requireCoachAccess } from '../middleware/coach-access.middleware';
import { sendError } from '../middleware/error-response';
import { sortNewestFirst, type AssessmentStore } from '../services/assessment-store';
import { generateAssessmentPdf } from '../services/report-service';
import { evaluate } from '../services/scoring-service';
import type { CompetencyCatalog } from '../services/catalog-service';
import type { StoredAssessment } from '../types/assessment';

interface CoachRouterDeps {
  catalog: CompetencyCatalog;
  store: AssessmentStore;
  coachAccessToken: string | undefined;
  reportTimeZone: string;
}

/** Reviewer routes. Every path sits behind the shared `?coach=` token. */
export const createCoachRouter = ({ catalog, store, coachAccessToken, reportTimeZone }: CoachRouterDeps) => {
  const router = Router();
  router.use(requireCoachAccess(coachAccessToken));

  const withEvaluation = (assessment: StoredAssessment) => ({
    ...assessment,
    evaluation: evaluate(catalog, assessment.scores),
  });

  router.get('/assessments', async (req, res) => {
    try {
      const assessments = sortNewestFirst(await store.loadAll());
      res.status(200).json(assessments.map(withEvaluation));
    } catch (error) {
      sendError(res, error, 'Error listing assessments');
    }
  });

  router.get('/assessments/:recordId', async (req, res) => {
    try {
      const assessment = await store.findById(req.params.recordId);
      res.status(200).json(withEvaluation(assessment));
    } catch (error) {
      sendError(res, error, 'Error fetching assessment');
    }
  });

  router.delete('/assessments/:recordId', async (req, res) => {
    try {
      await store.delete(req.params.recordId);
      res.status(200).send({ message: 'Assessment deleted successfully!' });
    } catch (error) {
      sendError(res, error, 'Error deleting assessment');
    }
  });

  router.get('/assessments/:recordId/report', async (req, res) => {
    try {
      const assessment = await store.findById(req.params.recordId);
      const { buffer, filename } = generateAssessmentPdf(catalog, assessment, reportTimeZone);

      res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
      res.setHeader('Content-Type', 'application/pdf');
      res.send(buffer);
    } catch (error) {
      sendError(res, error, 'Error exporting assessment');
    }
  });

  return router;
};
