// backend/src/services/scoring-service.ts
import type { CompetencyCatalog } from './catalog-service';
import type {
  AssessmentEvaluation,
  DimensionResult,
  DimensionScores,
  InterpretationBand,
  ScoreMap,
} from '../types/assessment';

/**
 * Sums the recorded ratings of every catalog dimension.
 * Dimensions without any ratings total 0 so an in-progress map never throws.
 */
export const dimensionTotals = (catalog: CompetencyCatalog, scores: ScoreMap): DimensionScores => {
  const totals: DimensionScores = {};
  for (const dimension of catalog.allDimensions()) {
    const ratings = scores[dimension.id] ?? {};
    totals[dimension.id] = Object.values(ratings).reduce((sum, rating) => sum + rating, 0);
  }
  return totals;
};

export const interpret = (catalog: CompetencyCatalog, dimensionId: string, total: number): InterpretationBand =>
  catalog.bandFor(dimensionId, total);

export const countAnswered = (scores: ScoreMap): number =>
  Object.values(scores).reduce((sum, ratings) => sum + Object.keys(ratings).length, 0);

/** Totals, bands, narrative text and per-statement detail, in catalog order. */
export const evaluate = (catalog: CompetencyCatalog, scores: ScoreMap): AssessmentEvaluation => {
  const dimensionScores = dimensionTotals(catalog, scores);

  const results: DimensionResult[] = catalog.allDimensions().map((dimension) => {
    const total = dimensionScores[dimension.id];
    const band = interpret(catalog, dimension.id, total);
    const { interpretation, development } = catalog.textFor(dimension.id, band);
    const ratings = scores[dimension.id] ?? {};

    return {
      dimensionId: dimension.id,
      title: dimension.title,
      total,
      maxTotal: catalog.maxTotal(dimension.id),
      band,
      interpretation,
      development,
      statements: dimension.statements.map((statement) => ({
        statementId: statement.id,
        text: statement.text,
        rating: ratings[statement.id] ?? null,
      })),
    };
  });

  return { dimensionScores, results };
};
