/**
 * Sum file layout resolution.
 *
 * A sum file is free-form text above a separator line of dashes. The line just
 * above the separator holds the column labels and the line above that may
 * carry UNC/COR markers telling the two DEPTH columns apart. Everything below
 * the separator is the body.
 */

import { ambiguousLayout, invalidFormat, unknownColumn } from '../shared/index.js';
import { lookupAlias, type CanonicalField } from './aliases.js';
import { blankRuns } from './tokenize.js';

const SEPARATOR_PREFIX = '-'.repeat(10);

const UNCORRECTED_MARKER = 'UNC';
const CORRECTED_MARKERS = ['COR', 'XXX'] as const;

export interface PreheaderMarkers {
  /** Offset of "UNC" in the preheader line, or null. */
  uncorrected: number | null;
  /** Offset of "COR" (else "XXX") in the preheader line, or null. */
  corrected: number | null;
}

export interface SumLayout {
  separatorIndex: number;
  preheader: string;
  header: string;
  headerLabels: string[];
  /** One canonical name per header label, duplicates resolved. */
  fields: CanonicalField[];
  /** Fields the caller declared empty; decoded as null without consuming tokens. */
  emptyFields: ReadonlySet<CanonicalField>;
  markers: PreheaderMarkers;
  /** Index of the first body line. */
  bodyStart: number;
}

export function findSeparatorIndex(lines: readonly string[]): number {
  const index = lines.findIndex(line => line.trimEnd().startsWith(SEPARATOR_PREFIX));
  if (index === -1) {
    throw invalidFormat('No header separation line found');
  }
  return index;
}

export function splitHeaderLabels(header: string): string[] {
  const spaces = Array.from(header, ch => ch === ' ');
  return blankRuns(spaces).map(run => header.slice(run.start, run.end).trim());
}

export function findPreheaderMarkers(preheader: string): PreheaderMarkers {
  const unc = preheader.indexOf(UNCORRECTED_MARKER);
  let cor = -1;
  for (const marker of CORRECTED_MARKERS) {
    cor = preheader.indexOf(marker);
    if (cor !== -1) break;
  }
  return {
    uncorrected: unc === -1 ? null : unc,
    corrected: cor === -1 ? null : cor,
  };
}

function canonicalize(label: string): CanonicalField {
  const field = lookupAlias(label);
  if (field === undefined) throw unknownColumn(label);
  return field;
}

/**
 * Retag one of two DEPTH columns as corrected_depth. The preheader marker that
 * comes later on the line belongs to the later column.
 */
export function resolveDuplicateFields(
  fields: readonly CanonicalField[],
  markers: PreheaderMarkers,
): CanonicalField[] {
  const counts = new Map<CanonicalField, number>();
  for (const field of fields) {
    counts.set(field, (counts.get(field) ?? 0) + 1);
  }
  const duplicated = [...counts].filter(([, count]) => count > 1);
  if (duplicated.length === 0) return [...fields];

  const [only] = duplicated;
  const onlyDepthTwice = duplicated.length === 1
    && only !== undefined
    && only[0] === 'depth'
    && only[1] === 2;
  if (!onlyDepthTwice) {
    throw ambiguousLayout('Duplicate column headers', {
      duplicates: Object.fromEntries(duplicated),
    });
  }

  const { uncorrected, corrected } = markers;
  if (uncorrected === null || corrected === null) {
    throw ambiguousLayout('Two DEPTH columns but the preheader does not mark which is corrected', {
      uncorrected,
      corrected,
    });
  }

  if (fields.includes('corrected_depth')) {
    throw ambiguousLayout('Two DEPTH columns next to an explicit corrected depth column', {
      duplicates: { depth: 2 },
    });
  }

  const resolved = [...fields];
  const target = corrected > uncorrected ? resolved.lastIndexOf('depth') : resolved.indexOf('depth');
  resolved[target] = 'corrected_depth';
  return resolved;
}

export function resolveEmptyFields(emptyCols: Iterable<string>): Set<CanonicalField> {
  const out = new Set<CanonicalField>();
  for (const label of emptyCols) {
    out.add(canonicalize(label));
  }
  return out;
}

export function resolveLayout(lines: readonly string[], emptyCols: Iterable<string> = []): SumLayout {
  const separatorIndex = findSeparatorIndex(lines);
  const header = lines[separatorIndex - 1];
  const preheader = lines[separatorIndex - 2];
  if (header === undefined || preheader === undefined) {
    throw invalidFormat('Separator line leaves no room for a header and preheader line', {
      separator_line: separatorIndex + 1,
    });
  }

  const headerLabels = splitHeaderLabels(header);
  const markers = findPreheaderMarkers(preheader);
  const fields = resolveDuplicateFields(headerLabels.map(canonicalize), markers);

  return {
    separatorIndex,
    preheader,
    header,
    headerLabels,
    fields,
    emptyFields: resolveEmptyFields(emptyCols),
    markers,
    bodyStart: separatorIndex + 1,
  };
}
