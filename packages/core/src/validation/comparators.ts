import type { ClaimValue } from './value-classifier.js';

/**
 * `same`: compatible values that merge. `conflict`: same quantity, incompatible
 * values. `unrelated`: not comparable (different kinds or units).
 * `undecided`: free text, or assertions about different subjects, that the
 * comparators cannot settle on their own.
 */
export type ValueRelation = 'same' | 'conflict' | 'unrelated' | 'undecided';

export interface CompareOptions {
  /** Relative slack applied to numeric bounds. */
  readonly numericTolerance: number;
}

function compareNumeric(
  a: Extract<ClaimValue, { kind: 'numeric' }>,
  b: Extract<ClaimValue, { kind: 'numeric' }>,
  tolerance: number,
): ValueRelation {
  if (a.unit !== b.unit) {
    return 'unrelated';
  }

  const magnitude = Math.max(Math.abs(a.low), Math.abs(a.high), Math.abs(b.low), Math.abs(b.high));
  const slack = tolerance * magnitude;
  const overlaps = a.low - slack <= b.high && b.low - slack <= a.high;
  return overlaps ? 'same' : 'conflict';
}

function compareDate(a: string, b: string): ValueRelation {
  // Coarser dates (YYYY-MM) are compatible with any day inside them
  return a.startsWith(b) || b.startsWith(a) ? 'same' : 'conflict';
}

export function compareValues(a: ClaimValue, b: ClaimValue, options: CompareOptions): ValueRelation {
  if (a.kind === 'numeric' && b.kind === 'numeric') {
    return compareNumeric(a, b, options.numericTolerance);
  }
  if (a.kind === 'date' && b.kind === 'date') {
    return compareDate(a.date, b.date);
  }
  if (a.kind === 'boolean' && b.kind === 'boolean') {
    if (a.subject !== b.subject) {
      return 'undecided';
    }
    return a.polarity === b.polarity ? 'same' : 'conflict';
  }
  if (a.kind === 'text' && b.kind === 'text') {
    return a.normalized === b.normalized ? 'same' : 'undecided';
  }
  return 'unrelated';
}
