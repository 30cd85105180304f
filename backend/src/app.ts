// backend/src/app.ts
import express from 'express';
import cors from 'cors';
import { createAssessmentRouter } from './routes/assessment.routes';
import { createCoachRouter } from './routes/coach.routes';
import { AssessmentStore } from './services/assessment-store';
import { SessionService } from './services/session-service';
import type { AppConfig } from './config';
import type { CompetencyCatalog } from './services/catalog-service';

export interface AppDeps {
  config: AppConfig;
  catalog: CompetencyCatalog;
  store?: AssessmentStore;
  sessions?: SessionService;
}

export const createApp = ({ config, catalog, store, sessions }: AppDeps) => {
  const assessmentStore = store ?? new AssessmentStore(config.dataDir, catalog);
  const sessionService =
    sessions ??
    new SessionService(catalog, assessmentStore, {
      allowPartialCompletion: config.allowPartialCompletion,
      idleTimeoutMs: config.sessionIdleMinutes * 60_000,
    });

  const app = express();

  // --- 1. Middleware ---
  app.use(cors({ origin: config.corsOrigin, exposedHeaders: ['Content-Disposition'] }));
  app.use(express.json({ limit: '1mb' }));

  // --- 2. Routes ---
  app.use('/api', createAssessmentRouter({ catalog, sessions: sessionService }));
  app.use(
    '/api/coach',
    createCoachRouter({
      catalog,
      store: assessmentStore,
      coachAccessToken: config.coachAccessToken,
      reportTimeZone: config.reportTimeZone,
    })
  );

  app.get('/', (req, res) => {
    res.send('Leadership Assessment API is running!');
  });

  return app;
};
