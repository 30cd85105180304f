import { generateSequence } from '../src/services/question-sequencer';
import { testCatalog } from './helpers';

describe('generateSequence', () => {
  const catalog = testCatalog();
  const catalogPairs = catalog
    .allDimensions()
    .flatMap((d) => d.statements.map((s) => `${d.id}/${s.id}`))
    .sort();

  it.each([[1], [42], [2024], [undefined]])('should cover every statement exactly once (seed %p)', (seed) => {
    const sequence = generateSequence(catalog, seed);

    expect(sequence).toHaveLength(48);
    expect(sequence.map((q) => q.position)).toEqual(Array.from({ length: 48 }, (_, i) => i + 1));
    expect(sequence.map((q) => `${q.dimensionId}/${q.statementId}`).sort()).toEqual(catalogPairs);
  });

  it('should carry the statement text with each entry', () => {
    for (const question of generateSequence(catalog, 7)) {
      const statement = catalog.statementsFor(question.dimensionId).find((s) => s.id === question.statementId);
      expect(question.text).toBe(statement?.text);
    }
  });

  it('should repeat the same order for the same seed', () => {
    expect(generateSequence(catalog, 99)).toEqual(generateSequence(catalog, 99));
  });

  it('should produce different orders for different seeds', () => {
    const first = generateSequence(catalog, 1).map((q) => `${q.dimensionId}/${q.statementId}`);
    const second = generateSequence(catalog, 2).map((q) => `${q.dimensionId}/${q.statementId}`);

    expect(first).not.toEqual(second);
  });
});
