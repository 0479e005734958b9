/**
 * WOCE sum file reader.
 *
 * Structural problems (not ASCII, no separator, unknown or ambiguous headers,
 * body columns that do not fit the header) are thrown by `openSum` before any
 * row is produced. Rows are then decoded lazily, one body line per `next()`,
 * and a malformed value only nulls out its own field.
 */

import { invalidFormat } from '../shared/index.js';
import type { CanonicalField } from './aliases.js';
import { decodeField, TokenCursor, type SumRow } from './fields.js';
import { resolveLayout, type SumLayout } from './layout.js';
import { checkColumnCount, computeColumnSlices, sliceLine, type ColumnSlice } from './tokenize.js';

export type SumInput = Uint8Array | string;

export interface ReadSumOptions {
  /** Header labels whose columns are present in the header but blank in the body. */
  emptyCols?: Iterable<string>;
}

export interface OpenedSum {
  layout: SumLayout;
  slices: readonly ColumnSlice[];
  body: readonly string[];
  /** Single pass; not restartable. */
  rows: IterableIterator<SumRow>;
}

const NON_ASCII_RE = /[^\x00-\x7f]/;

export function decodeAscii(input: SumInput): string {
  if (typeof input === 'string') {
    const match = NON_ASCII_RE.exec(input);
    if (match) {
      throw invalidFormat('non-ASCII input', { offset: match.index });
    }
    return input;
  }
  const offset = input.findIndex(byte => byte > 0x7f);
  if (offset !== -1) {
    throw invalidFormat('non-ASCII input', { offset });
  }
  return Buffer.from(input.buffer, input.byteOffset, input.byteLength).toString('latin1');
}

const LINE_BREAK_RE = /\r\n|[\n\v\f\r\x1c\x1d\x1e]/;

/**
 * Split on every ASCII line boundary: \n, \r\n, \r, \v, \f and the
 * file/group/record separators. A trailing break does not start another line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(LINE_BREAK_RE);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function decodeInto<K extends CanonicalField>(
  row: SumRow,
  field: K,
  cursor: TokenCursor,
  emptyFields: ReadonlySet<CanonicalField>,
): void {
  row[field] = emptyFields.has(field) ? null : decodeField(field, cursor);
}

export function decodeRow(
  tokens: readonly string[],
  fields: readonly CanonicalField[],
  emptyFields: ReadonlySet<CanonicalField>,
): SumRow {
  const row: SumRow = {};
  const cursor = new TokenCursor(tokens);
  for (const field of fields) {
    decodeInto(row, field, cursor, emptyFields);
    if (field === 'comments' && !emptyFields.has(field) && !cursor.done) {
      throw new Error(`comments decoder stopped at token ${cursor.position} of ${tokens.length}`);
    }
  }
  return row;
}

function* decodeRows(
  body: readonly string[],
  slices: readonly ColumnSlice[],
  layout: SumLayout,
): Generator<SumRow, void, undefined> {
  for (const line of body) {
    yield decodeRow(sliceLine(line, slices), layout.fields, layout.emptyFields);
  }
}

export function openSum(input: SumInput, options: ReadSumOptions = {}): OpenedSum {
  const lines = splitLines(decodeAscii(input));
  const layout = resolveLayout(lines, options.emptyCols ?? []);
  const body = lines.slice(layout.bodyStart);

  const slices = computeColumnSlices(body);
  if (body.length > 0) {
    checkColumnCount(layout.fields, layout.emptyFields, slices.length);
  }

  return { layout, slices, body, rows: decodeRows(body, slices, layout) };
}

export function readSum(input: SumInput, options: ReadSumOptions = {}): IterableIterator<SumRow> {
  return openSum(input, options).rows;
}
