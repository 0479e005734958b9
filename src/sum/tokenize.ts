/**
 * Body column inference.
 *
 * Header and body are not aligned to the same character positions, so the
 * body's columns are found from the body alone: a character position is a gap
 * only when it is blank in every body line.
 */

import { columnCountMismatch } from '../shared/index.js';
import type { CanonicalField } from './aliases.js';
import { TOKEN_ARITY } from './fields.js';

/** Half-open character range [start, end). */
export interface ColumnSlice {
  readonly start: number;
  readonly end: number;
}

/** Maximal runs of `false` in a blank mask. */
export function blankRuns(blank: readonly boolean[]): ColumnSlice[] {
  const runs: ColumnSlice[] = [];
  let start = -1;
  for (let position = 0; position < blank.length; position++) {
    if (!blank[position]) {
      if (start === -1) start = position;
    } else if (start !== -1) {
      runs.push({ start, end: position });
      start = -1;
    }
  }
  if (start !== -1) runs.push({ start, end: blank.length });
  return runs;
}

export function computeColumnSlices(body: readonly string[]): ColumnSlice[] {
  const width = body.reduce((max, line) => Math.max(max, line.length), 0);
  const gap: boolean[] = new Array<boolean>(width).fill(true);
  for (const line of body) {
    for (let position = 0; position < line.length; position++) {
      if (line[position] !== ' ') gap[position] = false;
    }
  }
  return blankRuns(gap);
}

/** Short lines are not padded: a slice past the end yields ''. */
export function sliceLine(line: string, slices: readonly ColumnSlice[]): string[] {
  return slices.map(({ start, end }) => line.slice(start, end));
}

/**
 * Check the body's column count against the layout. Each active field needs
 * as many columns as its decoder takes tokens; parameters and comments make
 * the count a range.
 */
export function checkColumnCount(
  fields: readonly CanonicalField[],
  emptyFields: ReadonlySet<CanonicalField>,
  found: number,
): void {
  let min = 0;
  let max = 0;
  for (const field of fields) {
    if (emptyFields.has(field)) continue;
    min += TOKEN_ARITY[field].min;
    max += TOKEN_ARITY[field].max;
  }
  if (found < min) throw columnCountMismatch(min, found);
  if (found > max) throw columnCountMismatch(max, found);
}
