/**
 * Per-field decoders.
 *
 * A row is decoded by walking its tokens front to back in header order. Most
 * fields take one token, lat/lon take three, parameters takes one only when
 * it looks like a parameter list, and comments takes whatever is left.
 */

import type { CanonicalField } from './aliases.js';

export interface SumFieldValues {
  expocode: string | null;
  woce_sect: string | null;
  stnnbr: string | null;
  castno: string | null;
  parameters: string | null;
  comments: string;
  max_pressure: string | null;
  wire: string | null;
  bottles: string | null;
  height: string | null;
  /** Degrees north. */
  lat: number | null;
  /** Degrees east. */
  lon: number | null;
  type: string | null;
  date: string | null;
  time: string | null;
  event: string | null;
  nav: string | null;
  depth: string | null;
  corrected_depth: string | null;
}

/** Decoded row; keys are exactly the layout's fields, null marks absence. */
export type SumRow = { [K in CanonicalField]?: SumFieldValues[K] | null };

export class TokenCursor {
  private index = 0;

  constructor(private readonly tokens: readonly string[]) {}

  get position(): number {
    return this.index;
  }

  get done(): boolean {
    return this.index >= this.tokens.length;
  }

  peek(): string | undefined {
    return this.tokens[this.index];
  }

  take(): string | undefined {
    const token = this.tokens[this.index];
    if (token !== undefined) this.index += 1;
    return token;
  }

  takeRest(): string[] {
    const rest = this.tokens.slice(this.index);
    this.index = this.tokens.length;
    return rest;
  }
}

export type FieldDecoder<K extends CanonicalField> = (cursor: TokenCursor) => SumFieldValues[K];

// ── Decoders ────────────────────────────────────────────────────────────────

const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const PARAMETER_CHARS_RE = /^[0-9,\- ]*$/;

const HEMISPHERE_SIGN: Readonly<Record<string, 1 | -1>> = {
  N: 1,
  E: 1,
  S: -1,
  W: -1,
};

export function parseDecimal(raw: string | undefined): number | null {
  const s = raw?.trim() ?? '';
  if (!DECIMAL_RE.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export function decodeScalar(cursor: TokenCursor): string | null {
  const token = cursor.take();
  return token === undefined ? null : token.trim();
}

/** "[D]DD MM.MM X" spread over three tokens. Always takes three. */
export function decodeCoordinate(cursor: TokenCursor): number | null {
  const degreeToken = cursor.take();
  const minuteToken = cursor.take();
  const hemisphereToken = cursor.take();

  const degree = parseDecimal(degreeToken);
  const minute = parseDecimal(minuteToken);
  if (degree === null || minute === null) return null;

  const sign = HEMISPHERE_SIGN[hemisphereToken?.trim().toUpperCase() ?? ''];
  if (sign === undefined) return null;

  return sign * (degree + minute / 60);
}

export function isParameterList(token: string): boolean {
  return PARAMETER_CHARS_RE.test(token);
}

/** Parameter lists have no delimiter before the comments, so shape decides. */
export function decodeParameters(cursor: TokenCursor): string | null {
  const token = cursor.peek();
  if (token === undefined || !isParameterList(token)) return null;
  cursor.take();
  return token.trim();
}

export function decodeComments(cursor: TokenCursor): string {
  return cursor
    .takeRest()
    .map(token => token.trim())
    .filter(token => token.length > 0)
    .join(' ');
}

export const FIELD_DECODERS: { readonly [K in CanonicalField]: FieldDecoder<K> } = {
  expocode: decodeScalar,
  woce_sect: decodeScalar,
  stnnbr: decodeScalar,
  castno: decodeScalar,
  type: decodeScalar,
  date: decodeScalar,
  time: decodeScalar,
  event: decodeScalar,
  lat: decodeCoordinate,
  lon: decodeCoordinate,
  nav: decodeScalar,
  depth: decodeScalar,
  corrected_depth: decodeScalar,
  height: decodeScalar,
  wire: decodeScalar,
  bottles: decodeScalar,
  max_pressure: decodeScalar,
  parameters: decodeParameters,
  comments: decodeComments,
};

/** How many body columns each field's decoder takes. */
export const TOKEN_ARITY: { readonly [K in CanonicalField]: { min: number; max: number } } = {
  expocode: { min: 1, max: 1 },
  woce_sect: { min: 1, max: 1 },
  stnnbr: { min: 1, max: 1 },
  castno: { min: 1, max: 1 },
  type: { min: 1, max: 1 },
  date: { min: 1, max: 1 },
  time: { min: 1, max: 1 },
  event: { min: 1, max: 1 },
  lat: { min: 3, max: 3 },
  lon: { min: 3, max: 3 },
  nav: { min: 1, max: 1 },
  depth: { min: 1, max: 1 },
  corrected_depth: { min: 1, max: 1 },
  height: { min: 1, max: 1 },
  wire: { min: 1, max: 1 },
  bottles: { min: 1, max: 1 },
  max_pressure: { min: 1, max: 1 },
  parameters: { min: 0, max: 1 },
  comments: { min: 0, max: Number.POSITIVE_INFINITY },
};

export function decodeField<K extends CanonicalField>(field: K, cursor: TokenCursor): SumFieldValues[K] {
  const decoder: FieldDecoder<K> = FIELD_DECODERS[field];
  return decoder(cursor);
}
