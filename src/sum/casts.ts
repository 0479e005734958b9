/**
 * Groups decoded sum rows into casts.
 *
 * A cast is identified by (STNNBR, CASTNO) and usually spans several lines,
 * one per event (BE, BO, EN, ...). Comments and parameter lists may be
 * continued across those lines.
 *
 * Dates and times are passed through as written. Sum files use two-digit
 * years and no century rule is defined, so no timestamp is built here.
 */

import type { SumRow } from './fields.js';

export interface SumEvent {
  date?: string;
  time?: string;
  /** Seconds: 60 when a time is given, 86400 for a date alone. */
  date_precision?: 60 | 86400;
  lat?: number;
  lon?: number;
  nav?: string;
  height?: number;
  wire?: number;
  max_pressure?: number;
  bottles?: number;
  depth?: number;
  corrected_depth?: number;
}

export interface SumCast {
  expocode: string | null;
  woce_sect: string | null;
  stnnbr: string | null;
  castno: string | null;
  type: string | null;
  parameters: string;
  comments: string;
  /** Keyed by lower-cased event code. */
  events: Record<string, SumEvent>;
  warnings: string[];
}

type CastLevelField = 'expocode' | 'woce_sect' | 'type';

const CAST_LEVEL_FIELDS: readonly CastLevelField[] = ['expocode', 'woce_sect', 'type'];

const NUMERIC_EVENT_FIELDS = [
  'height',
  'wire',
  'max_pressure',
  'bottles',
  'depth',
  'corrected_depth',
] as const;

const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;

function present(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function parseNumber(value: string | null | undefined): number | undefined {
  const s = present(value);
  if (s === null || !NUMBER_RE.test(s)) return undefined;
  return Number(s);
}

function castLevelValue(row: SumRow, field: CastLevelField): string | null {
  const value = present(row[field]);
  return field === 'type' && value !== null ? value.toLowerCase() : value;
}

export function castKey(row: SumRow): string {
  return JSON.stringify([present(row.stnnbr), present(row.castno)]);
}

export function buildEvent(row: SumRow): SumEvent {
  const event: SumEvent = {};

  const date = present(row.date);
  const time = present(row.time);
  if (date !== null) {
    event.date = date;
    event.date_precision = time !== null ? 60 : 86400;
  }
  if (time !== null) event.time = time;

  if (typeof row.lat === 'number') event.lat = row.lat;
  if (typeof row.lon === 'number') event.lon = row.lon;

  const nav = present(row.nav);
  if (nav !== null) event.nav = nav.toLowerCase();

  for (const field of NUMERIC_EVENT_FIELDS) {
    const value = parseNumber(row[field]);
    if (value !== undefined) event[field] = value;
  }
  return event;
}

interface CastDraft {
  cast: Omit<SumCast, 'events'>;
  events: Map<string, SumEvent>;
}

function newDraft(row: SumRow): CastDraft {
  return {
    cast: {
      expocode: null,
      woce_sect: null,
      stnnbr: present(row.stnnbr),
      castno: present(row.castno),
      type: null,
      parameters: '',
      comments: '',
      warnings: [],
    },
    events: new Map(),
  };
}

function appendText(existing: string, addition: string | null, separator: string): string {
  if (addition === null) return existing;
  return existing.length > 0 ? `${existing}${separator}${addition}` : addition;
}

function mergeRow({ cast, events }: CastDraft, row: SumRow): void {
  for (const field of CAST_LEVEL_FIELDS) {
    const value = castLevelValue(row, field);
    if (value === null) continue;
    const current = cast[field];
    if (current === null) {
      cast[field] = value;
    } else if (current !== value) {
      cast.warnings.push(`${field} differs within cast: ${JSON.stringify(current)} vs ${JSON.stringify(value)}`);
    }
  }

  cast.parameters = appendText(cast.parameters, present(row.parameters), ',');
  cast.comments = appendText(cast.comments, present(row.comments), ' ');

  const code = (present(row.event) ?? '').toLowerCase();
  if (events.has(code)) {
    cast.warnings.push(`Duplicate event code ${JSON.stringify(code)}; keeping the first`);
    return;
  }
  events.set(code, buildEvent(row));
}

export function groupCasts(rows: Iterable<SumRow>): SumCast[] {
  const drafts = new Map<string, CastDraft>();
  for (const row of rows) {
    const key = castKey(row);
    let draft = drafts.get(key);
    if (!draft) {
      draft = newDraft(row);
      drafts.set(key, draft);
    }
    mergeRow(draft, row);
  }
  return [...drafts.values()].map(({ cast, events }) => ({
    ...cast,
    events: Object.fromEntries(events),
  }));
}
