// backend/src/services/catalog-service.ts
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { UnknownDimensionError } from '../errors';
import {
  INTERPRETATION_BANDS,
  type BandText,
  type Dimension,
  type InterpretationBand,
  type RatingOption,
  type Statement,
} from '../types/assessment';

export const DEFAULT_CATALOG_DIR = path.resolve(__dirname, '../../catalog');

const StatementSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
});

const CatalogSchema = z.object({
  dimensions: z
    .array(
      z.object({
        id: z.string().min(1),
        title: z.string().min(1),
        statements: z.array(StatementSchema).length(6),
      })
    )
    .min(1),
  ratingScale: z
    .array(z.object({ value: z.number().int().min(1).max(10), label: z.string().min(1) }))
    .length(10),
});

const BandTextSchema = z.object({
  interpretation: z.string().min(1),
  development: z.string().min(1),
});

const InterpretationSchema = z.record(
  z.object({
    high: BandTextSchema,
    medium_high: BandTextSchema,
    medium: BandTextSchema,
    medium_low: BandTextSchema,
    low: BandTextSchema,
  })
);

export type CatalogData = z.infer<typeof CatalogSchema>;
export type InterpretationData = z.infer<typeof InterpretationSchema>;

/**
 * Read-only view over the competency dimensions, their statements and the
 * interpretation text for each score band. Built once at startup.
 */
export class CompetencyCatalog {
  private readonly dimensions: Dimension[];
  private readonly byId: Map<string, Dimension>;
  private readonly scale: RatingOption[];
  private readonly texts: InterpretationData;

  constructor(catalog: CatalogData, interpretations: InterpretationData) {
    this.dimensions = catalog.dimensions.map((d) => ({
      id: d.id,
      title: d.title,
      statements: d.statements.map((s) => ({ id: s.id, text: s.text })),
    }));
    this.byId = new Map(this.dimensions.map((d) => [d.id, d]));
    this.scale = [...catalog.ratingScale].sort((a, b) => a.value - b.value);
    this.texts = interpretations;

    if (this.byId.size !== this.dimensions.length) {
      throw new Error('Catalog contains duplicate dimension ids.');
    }
    for (const dimension of this.dimensions) {
      const statementIds = new Set(dimension.statements.map((s) => s.id));
      if (statementIds.size !== dimension.statements.length) {
        throw new Error(`Dimension "${dimension.id}" contains duplicate statement ids.`);
      }
      if (!interpretations[dimension.id]) {
        throw new Error(`No interpretation text for dimension "${dimension.id}".`);
      }
    }
  }

  allDimensions(): Dimension[] {
    return this.dimensions;
  }

  dimension(dimensionId: string): Dimension {
    const dimension = this.byId.get(dimensionId);
    if (!dimension) throw new UnknownDimensionError(dimensionId);
    return dimension;
  }

  statementsFor(dimensionId: string): Statement[] {
    return this.dimension(dimensionId).statements;
  }

  hasStatement(dimensionId: string, statementId: string): boolean {
    const dimension = this.byId.get(dimensionId);
    return !!dimension && dimension.statements.some((s) => s.id === statementId);
  }

  /** Highest possible total for one dimension. */
  maxTotal(dimensionId: string): number {
    return this.statementsFor(dimensionId).length * 10;
  }

  get questionCount(): number {
    return this.dimensions.reduce((sum, d) => sum + d.statements.length, 0);
  }

  bandFor(dimensionId: string, score: number): InterpretationBand {
    this.dimension(dimensionId);
    if (score >= 51) return 'high';
    if (score >= 41) return 'medium_high';
    if (score >= 31) return 'medium';
    if (score >= 21) return 'medium_low';
    return 'low';
  }

  textFor(dimensionId: string, band: InterpretationBand): BandText {
    this.dimension(dimensionId);
    const { interpretation, development } = this.texts[dimensionId][band];
    return { interpretation, development };
  }

  ratingScale(): RatingOption[] {
    return this.scale;
  }
}

const readJson = (filePath: string): unknown => JSON.parse(fs.readFileSync(filePath, 'utf-8'));

/**
 * Loads competencies.json and interpretations.json from `dataDir`.
 * Throws if either file is missing or does not match its schema.
 */
export const loadCatalog = (dataDir: string = DEFAULT_CATALOG_DIR): CompetencyCatalog => {
  const catalog = CatalogSchema.parse(readJson(path.join(dataDir, 'competencies.json')));
  const interpretations = InterpretationSchema.parse(readJson(path.join(dataDir, 'interpretations.json')));
  const instance = new CompetencyCatalog(catalog, interpretations);

  console.log(
    `[Catalog] Loaded ${instance.allDimensions().length} dimensions, ${instance.questionCount} statements, ` +
      `${INTERPRETATION_BANDS.length} bands each.`
  );
  return instance;
};
