// backend/src/services/assessment-store.ts
import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { MalformedRecordError, NotFoundError, StorageUnavailableError } from '../errors';
import { dimensionTotals } from './scoring-service';
import type { CompetencyCatalog } from './catalog-service';
import type { AssessmentRecord, StoredAssessment } from '../types/assessment';

/** Start time given to records saved before the start was tracked, so sorting stays total. */
export const MISSING_START_SENTINEL = '1970-01-01T00:00:00.000Z';

// Also admits older file names that embed the raw e-mail address; never a path separator.
const RECORD_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.@+-]*$/;

const StoredRecordSchema = z.object({
  coachee_name: z
    .string()
    .nullish()
    .transform((v) => v ?? 'Unknown'),
  coachee_email: z
    .string()
    .nullish()
    .transform((v) => v ?? 'Unknown'),
  coachee_phone: z
    .string()
    .nullish()
    .transform((v) => v ?? ''),
  assessment_start: z.string().nullish(),
  completion_time: z.string().nullish(),
  scores: z.record(z.record(z.number().int())),
  dimension_scores: z.record(z.number()).nullish(),
});

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const emailSlug = (email: string): string =>
  email
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '') || 'respondent';

// 2026-10-19T14:03:09.123Z -> 20261019_140309
const compactTimestamp = (iso: string): string => {
  const date = new Date(iso);
  const stamp = Number.isNaN(date.getTime()) ? new Date() : date;
  return stamp
    .toISOString()
    .slice(0, 19)
    .replace(/-/g, '')
    .replace(/:/g, '')
    .replace('T', '_');
};

export const buildRecordId = (record: AssessmentRecord): string => {
  const completed = record.completion_time ?? new Date().toISOString();
  const suffix = uuidv4().replace(/-/g, '').slice(0, 8);
  return `assessment_${emailSlug(record.coachee_email)}_${compactTimestamp(completed)}_${suffix}`;
};

const timeValue = (iso: string | undefined): number => {
  const value = iso ? Date.parse(iso) : NaN;
  return Number.isNaN(value) ? 0 : value;
};

/** Most recent first, by start, then completion, then id. */
export const sortNewestFirst = <T extends StoredAssessment>(records: T[]): T[] =>
  [...records].sort(
    (a, b) =>
      timeValue(b.assessment_start) - timeValue(a.assessment_start) ||
      timeValue(b.completion_time) - timeValue(a.completion_time) ||
      b.id.localeCompare(a.id)
  );

/**
 * One JSON file per completed assessment in a flat directory.
 * Files are written to a temporary name and renamed into place, so a reader
 * either sees the whole record or none of it.
 */
export class AssessmentStore {
  constructor(
    private readonly dataDir: string,
    private readonly catalog: CompetencyCatalog
  ) {}

  get directory(): string {
    return this.dataDir;
  }

  async save(record: AssessmentRecord): Promise<string> {
    const id = buildRecordId(record);
    const finalPath = this.pathFor(id);
    const tempPath = path.join(this.dataDir, `.${id}.json.tmp`);
    const payload: AssessmentRecord = {
      ...record,
      dimension_scores: dimensionTotals(this.catalog, record.scores),
    };

    try {
      await fs.mkdir(this.dataDir, { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(payload, null, 2), 'utf-8');
      await fs.rename(tempPath, finalPath);
    } catch (error) {
      console.error(`[Store] Failed to save ${id}:`, error);
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn(`[Store] Could not remove temporary file ${tempPath}:`, cleanupError);
      });
      throw new StorageUnavailableError('The assessment could not be saved. Please try again.', error);
    }

    console.log(`[Store] Saved assessment ${id}`);
    return id;
  }

  /** Every readable record. Unparseable files are logged and skipped; order is unspecified. */
  async loadAll(): Promise<StoredAssessment[]> {
    let fileNames: string[];
    try {
      fileNames = await fs.readdir(this.dataDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw new StorageUnavailableError('Stored assessments could not be read.', error);
    }

    const loaded = await Promise.all(
      fileNames
        .filter((name) => name.endsWith('.json'))
        .map(async (name) => {
          try {
            return await this.readRecord(name.slice(0, -'.json'.length));
          } catch (error) {
            if (error instanceof MalformedRecordError) {
              console.warn(`[Store] Skipping: ${error.message}`);
              return null;
            }
            if (isErrnoException(error) && error.code === 'ENOENT') {
              // removed between readdir and readFile
              return null;
            }
            console.warn(`[Store] Skipping unreadable record ${name}: ${errorMessage(error)}`);
            return null;
          }
        })
    );

    return loaded.filter((record): record is StoredAssessment => record !== null);
  }

  async findById(id: string): Promise<StoredAssessment> {
    if (!RECORD_ID_PATTERN.test(id)) throw new NotFoundError(`Assessment ${id} not found.`);
    try {
      return await this.readRecord(id);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`Assessment ${id} not found.`);
      }
      if (error instanceof MalformedRecordError) {
        console.warn(`[Store] ${error.message}`);
        throw new NotFoundError(`Assessment ${id} not found.`);
      }
      throw new StorageUnavailableError('The assessment could not be read.', error);
    }
  }

  async delete(id: string): Promise<void> {
    if (!RECORD_ID_PATTERN.test(id)) throw new NotFoundError(`Assessment ${id} not found.`);
    try {
      await fs.unlink(this.pathFor(id));
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`Assessment ${id} not found.`);
      }
      console.error(`[Store] Failed to delete ${id}:`, error);
      throw new StorageUnavailableError('The assessment could not be deleted. Please try again.', error);
    }
    console.log(`[Store] Deleted assessment ${id}`);
  }

  private pathFor(id: string): string {
    return path.join(this.dataDir, `${id}.json`);
  }

  private async readRecord(id: string): Promise<StoredAssessment> {
    const fileName = `${id}.json`;
    const raw = await fs.readFile(this.pathFor(id), 'utf-8');

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new MalformedRecordError(fileName, errorMessage(error));
    }

    const parsed = StoredRecordSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new MalformedRecordError(fileName, `${issue.path.join('.') || 'record'}: ${issue.message}`);
    }

    const data = parsed.data;
    const record: StoredAssessment = {
      id,
      coachee_name: data.coachee_name,
      coachee_email: data.coachee_email,
      coachee_phone: data.coachee_phone,
      assessment_start: data.assessment_start ?? MISSING_START_SENTINEL,
      scores: data.scores,
      dimension_scores: dimensionTotals(this.catalog, data.scores),
    };
    if (data.completion_time) record.completion_time = data.completion_time;
    return record;
  }
}
