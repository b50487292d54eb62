import { compareByComposite, type Rankable } from './ranking';

function scored<T extends Rankable>(rows: readonly T[]): T[] {
  return rows.filter((row) => row.compositeScore !== null).sort(compareByComposite);
}

export function selectTopK<T extends Rankable>(rows: readonly T[], k: number): T[] {
  return scored(rows).slice(0, Math.max(0, k));
}

/** Weakest first. */
export function selectBottomK<T extends Rankable>(rows: readonly T[], k: number): T[] {
  return scored(rows).reverse().slice(0, Math.max(0, k));
}
