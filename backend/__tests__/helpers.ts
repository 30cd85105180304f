import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadCatalog, type CompetencyCatalog } from '../src/services/catalog-service';
import type { AppConfig } from '../src/config';
import type { AssessmentRecord, ScoreMap } from '../src/types/assessment';

let cachedCatalog: CompetencyCatalog | undefined;

export const testCatalog = (): CompetencyCatalog => {
  if (!cachedCatalog) {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    cachedCatalog = loadCatalog();
    logSpy.mockRestore();
  }
  return cachedCatalog;
};

export const makeTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), 'assessment-test-'));

export const removeDir = (dir: string) => fs.rmSync(dir, { recursive: true, force: true });

/** Every statement rated; `ratingFor` picks the value per dimension. */
export const fullScores = (catalog: CompetencyCatalog, ratingFor: (dimensionId: string) => number): ScoreMap => {
  const scores: ScoreMap = {};
  for (const dimension of catalog.allDimensions()) {
    scores[dimension.id] = {};
    for (const statement of dimension.statements) {
      scores[dimension.id][statement.id] = ratingFor(dimension.id);
    }
  }
  return scores;
};

export const sampleRecord = (catalog: CompetencyCatalog, overrides: Partial<AssessmentRecord> = {}): AssessmentRecord => ({
  coachee_name: 'Jane Doe',
  coachee_email: 'jane@example.com',
  coachee_phone: '555-0100',
  assessment_start: '2026-10-19T14:10:00.000Z',
  completion_time: '2026-10-19T14:30:00.000Z',
  scores: fullScores(catalog, (id) => (id === 'purpose_vision' ? 10 : 1)),
  ...overrides,
});

export const testConfig = (dataDir: string, overrides: Partial<AppConfig> = {}): AppConfig => ({
  port: 0,
  dataDir,
  coachAccessToken: 'test-coach-token',
  allowPartialCompletion: false,
  sessionIdleMinutes: 120,
  reportTimeZone: 'UTC',
  corsOrigin: 'http://localhost:5173',
  ...overrides,
});

export const silenceConsole = () => {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
};
