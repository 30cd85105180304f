// backend/src/services/question-sequencer.ts
import crypto from 'crypto';
import type { CompetencyCatalog } from './catalog-service';
import type { QuestionEntry, QuestionSequence } from '../types/assessment';

type RandomIndex = (maxExclusive: number) => number;

// mulberry32: small deterministic PRNG, only used when a seed is given.
const seededIndex = (seed: number): RandomIndex => {
  let state = seed >>> 0;
  return (maxExclusive) => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    const unit = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    return Math.floor(unit * maxExclusive);
  };
};

const cryptoIndex: RandomIndex = (maxExclusive) => crypto.randomInt(maxExclusive);

/**
 * Every (dimension, statement) pair in a uniformly shuffled order, numbered 1..N.
 * Pass a seed only in tests; sessions use a fresh cryptographic shuffle.
 */
export const generateSequence = (catalog: CompetencyCatalog, seed?: number): QuestionSequence => {
  const entries: Omit<QuestionEntry, 'position'>[] = [];
  for (const dimension of catalog.allDimensions()) {
    for (const statement of dimension.statements) {
      entries.push({ dimensionId: dimension.id, statementId: statement.id, text: statement.text });
    }
  }

  const randomIndex = seed === undefined ? cryptoIndex : seededIndex(seed);

  // Fisher-Yates
  for (let i = entries.length - 1; i > 0; i--) {
    const j = randomIndex(i + 1);
    [entries[i], entries[j]] = [entries[j], entries[i]];
  }

  return entries.map((entry, index) => ({ position: index + 1, ...entry }));
};
