import fs from 'fs';
import path from 'path';
import request from 'supertest';
import { createApp } from '../src/app';
import { AssessmentStore } from '../src/services/assessment-store';
import type { QuestionEntry } from '../src/types/assessment';
import { makeTempDir, removeDir, sampleRecord, silenceConsole, testCatalog, testConfig } from './helpers';

const TOKEN = 'test-coach-token';

describe('assessment API', () => {
  const catalog = testCatalog();
  let dataDir: string;
  let store: AssessmentStore;
  let app: ReturnType<typeof createApp>;

  const startAssessment = async () => {
    const created = await request(app).post('/api/sessions');
    const { sessionId } = created.body;
    const intake = await request(app)
      .post(`/api/sessions/${sessionId}/intake`)
      .send({ name: 'Jane Doe', email: 'jane@example.com' });
    return { sessionId: String(sessionId), questions: intake.body.questions as QuestionEntry[] };
  };

  beforeEach(() => {
    silenceConsole();
    dataDir = makeTempDir();
    store = new AssessmentStore(dataDir, catalog);
    app = createApp({ config: testConfig(dataDir), catalog, store });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeDir(dataDir);
  });

  it('GET / should answer a liveness message', async () => {
    const res = await request(app).get('/');

    expect(res.statusCode).toBe(200);
    expect(res.text).toBe('Leadership Assessment API is running!');
  });

  it('GET /api/catalog should return dimensions and the rating scale', async () => {
    const res = await request(app).get('/api/catalog');

    expect(res.statusCode).toBe(200);
    expect(res.body.dimensions).toHaveLength(8);
    expect(res.body.dimensions[0].statements).toHaveLength(6);
    expect(res.body.ratingScale).toHaveLength(10);
  });

  describe('respondent flow', () => {
    it('should run from intake to a scored, stored assessment', async () => {
      const created = await request(app).post('/api/sessions');
      expect(created.statusCode).toBe(201);
      expect(created.body.state).toBe('intake');
      const { sessionId } = created.body;

      const missing = await request(app).post(`/api/sessions/${sessionId}/intake`).send({ name: 'Jane Doe' });
      expect(missing.statusCode).toBe(400);
      expect(missing.body).toEqual({
        message: 'Please fill in all required fields marked with *',
        fields: ['email'],
      });
      expect((await request(app).get(`/api/sessions/${sessionId}`)).body.state).toBe('intake');

      const intake = await request(app)
        .post(`/api/sessions/${sessionId}/intake`)
        .send({ name: 'Jane Doe', email: 'jane@example.com' });
      expect(intake.statusCode).toBe(200);
      expect(intake.body.state).toBe('in_progress');
      expect(intake.body.questions).toHaveLength(48);

      for (const question of intake.body.questions as QuestionEntry[]) {
        const rating = question.dimensionId === 'purpose_vision' ? 10 : 1;
        const res = await request(app).put(`/api/sessions/${sessionId}/answers/${question.position}`).send({ rating });
        expect(res.statusCode).toBe(200);
      }

      const done = await request(app).post(`/api/sessions/${sessionId}/complete`);
      expect(done.statusCode).toBe(201);
      expect(done.body.evaluation.dimensionScores.purpose_vision).toBe(60);
      for (const result of done.body.evaluation.results) {
        if (result.dimensionId === 'purpose_vision') {
          expect(result).toMatchObject({ total: 60, band: 'high' });
        } else {
          expect(result).toMatchObject({ total: 6, band: 'low' });
        }
      }

      expect((await request(app).get(`/api/sessions/${sessionId}`)).statusCode).toBe(404);

      const listed = await request(app).get('/api/coach/assessments').query({ coach: TOKEN });
      expect(listed.body).toHaveLength(1);
      expect(listed.body[0]).toMatchObject({
        id: done.body.recordId,
        coachee_name: 'Jane Doe',
        coachee_email: 'jane@example.com',
        coachee_phone: '',
      });
      expect(listed.body[0].dimension_scores.purpose_vision).toBe(60);
    });

    it('should refuse to complete an unfinished questionnaire', async () => {
      const { sessionId } = await startAssessment();

      const res = await request(app).post(`/api/sessions/${sessionId}/complete`);

      expect(res.statusCode).toBe(409);
      expect(res.body.unanswered).toBe(48);
    });

    it('should validate answers', async () => {
      const { sessionId } = await startAssessment();

      const tooHigh = await request(app).put(`/api/sessions/${sessionId}/answers/1`).send({ rating: 11 });
      const notANumber = await request(app).put(`/api/sessions/${sessionId}/answers/1`).send({ rating: 'ten' });
      const badPosition = await request(app).put(`/api/sessions/${sessionId}/answers/abc`).send({ rating: 5 });
      const outOfRange = await request(app).put(`/api/sessions/${sessionId}/answers/49`).send({ rating: 5 });

      expect(tooHigh.statusCode).toBe(400);
      expect(tooHigh.body.fields).toEqual(['rating']);
      expect(notANumber.statusCode).toBe(400);
      expect(badPosition.statusCode).toBe(400);
      expect(outOfRange.body.fields).toEqual(['position']);
    });

    it('should return 409 for actions out of order', async () => {
      const created = await request(app).post('/api/sessions');

      const res = await request(app).put(`/api/sessions/${created.body.sessionId}/answers/1`).send({ rating: 5 });

      expect(res.statusCode).toBe(409);
      expect(res.body.state).toBe('intake');
    });

    it('should return 404 for unknown sessions', async () => {
      const res = await request(app).get('/api/sessions/not-a-session');

      expect(res.statusCode).toBe(404);
      expect(res.body.message).toBe('Assessment session not found. Please start again.');
    });

    it('should report a failed save as retryable and keep the session', async () => {
      const blocker = path.join(dataDir, 'blocker');
      fs.writeFileSync(blocker, 'not a directory');
      app = createApp({
        config: testConfig(path.join(blocker, 'records'), { allowPartialCompletion: true }),
        catalog,
      });
      const { sessionId } = await startAssessment();
      await request(app).put(`/api/sessions/${sessionId}/answers/1`).send({ rating: 6 });

      const res = await request(app).post(`/api/sessions/${sessionId}/complete`);

      expect(res.statusCode).toBe(503);
      expect(res.body).toEqual({ message: 'The assessment could not be saved. Please try again.', retryable: true });
      const session = await request(app).get(`/api/sessions/${sessionId}`);
      expect(session.body).toMatchObject({ state: 'in_progress', answeredCount: 1 });
    });
  });

  describe('coach access', () => {
    it('should never route a wrong or missing token to the coach view', async () => {
      await store.save(sampleRecord(catalog));
      await startAssessment();

      const wrong = await request(app).get('/api/coach/assessments').query({ coach: 'wrong-token' });
      const missing = await request(app).get('/api/coach/assessments');
      const repeated = await request(app).get(`/api/coach/assessments?coach=${TOKEN}&coach=${TOKEN}`);

      expect(wrong.statusCode).toBe(403);
      expect(wrong.body).toEqual({ message: 'Coach access denied.' });
      expect(missing.statusCode).toBe(403);
      expect(repeated.statusCode).toBe(403);
    });

    it('should not delete anything without the token', async () => {
      const id = await store.save(sampleRecord(catalog));

      const res = await request(app).delete(`/api/coach/assessments/${id}`).query({ coach: 'wrong-token' });

      expect(res.statusCode).toBe(403);
      expect(await store.findById(id)).toMatchObject({ id });
    });

    it('should report a server without a token as misconfigured', async () => {
      app = createApp({ config: testConfig(dataDir, { coachAccessToken: undefined }), catalog, store });

      const res = await request(app).get('/api/coach/assessments').query({ coach: TOKEN });

      expect(res.statusCode).toBe(500);
      expect(res.body).toEqual({ message: 'Server configuration error.' });
    });
  });

  describe('coach view', () => {
    it('should list assessments newest first with their evaluation', async () => {
      await store.save(sampleRecord(catalog, { coachee_name: 'Older', assessment_start: '2026-01-05T09:00:00.000Z' }));
      await store.save(sampleRecord(catalog, { coachee_name: 'Newer', assessment_start: '2026-10-19T14:10:00.000Z' }));
      fs.writeFileSync(path.join(dataDir, 'broken.json'), '{not json');

      const res = await request(app).get('/api/coach/assessments').query({ coach: TOKEN });

      expect(res.statusCode).toBe(200);
      expect(res.body.map((a: { coachee_name: string }) => a.coachee_name)).toEqual(['Newer', 'Older']);
      expect(res.body[0].evaluation.results[0]).toMatchObject({
        dimensionId: 'purpose_vision',
        total: 60,
        band: 'high',
        interpretation: catalog.textFor('purpose_vision', 'high').interpretation,
      });
    });

    it('should fetch a single assessment or 404', async () => {
      const id = await store.save(sampleRecord(catalog));

      const found = await request(app).get(`/api/coach/assessments/${id}`).query({ coach: TOKEN });
      const missing = await request(app)
        .get('/api/coach/assessments/assessment_nobody_20260101_000000_abcdef12')
        .query({ coach: TOKEN });

      expect(found.statusCode).toBe(200);
      expect(found.body.evaluation.dimensionScores.execution_impact).toBe(6);
      expect(missing.statusCode).toBe(404);
    });

    it('should delete once and report NotFound the second time', async () => {
      const id = await store.save(sampleRecord(catalog));

      const first = await request(app).delete(`/api/coach/assessments/${id}`).query({ coach: TOKEN });
      const second = await request(app).delete(`/api/coach/assessments/${id}`).query({ coach: TOKEN });

      expect(first.statusCode).toBe(200);
      expect(first.body).toEqual({ message: 'Assessment deleted successfully!' });
      expect(second.statusCode).toBe(404);
      expect(second.body).toEqual({ message: `Assessment ${id} not found.` });
    });

    it('should export a PDF report as an attachment', async () => {
      const id = await store.save(sampleRecord(catalog));

      const res = await request(app).get(`/api/coach/assessments/${id}/report`).query({ coach: TOKEN });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('application/pdf');
      expect(res.headers['content-disposition']).toBe('attachment; filename="Jane Doe_assessment.pdf"');
      expect(Number(res.headers['content-length'])).toBeGreaterThan(0);
    });
  });
});
