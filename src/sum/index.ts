export { ALIAS_TABLE, CANONICAL_FIELDS, FIELD_SPELLINGS, lookupAlias } from './aliases.js';
export type { CanonicalField } from './aliases.js';
export { resolveLayout } from './layout.js';
export type { SumLayout, PreheaderMarkers } from './layout.js';
export { computeColumnSlices, sliceLine, checkColumnCount } from './tokenize.js';
export type { ColumnSlice } from './tokenize.js';
export { FIELD_DECODERS, TokenCursor } from './fields.js';
export type { SumFieldValues, SumRow } from './fields.js';
export { decodeAscii, openSum, readSum, splitLines } from './readSum.js';
export type { OpenedSum, ReadSumOptions, SumInput } from './readSum.js';
export { groupCasts } from './casts.js';
export type { SumCast, SumEvent } from './casts.js';
