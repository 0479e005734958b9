/**
 * Header label aliases for WOCE sum files.
 *
 * Producers spell the same column many ways (and misspell some), so every
 * label seen in the wild is listed under the field it stands for.
 * Labels are matched case-sensitively, exactly as they appear in files.
 */

export const CANONICAL_FIELDS = [
  'expocode',
  'woce_sect',
  'stnnbr',
  'castno',
  'parameters',
  'comments',
  'max_pressure',
  'wire',
  'bottles',
  'height',
  'lat',
  'lon',
  'type',
  'date',
  'time',
  'event',
  'nav',
  'depth',
  'corrected_depth',
] as const;

export type CanonicalField = typeof CANONICAL_FIELDS[number];

export const FIELD_SPELLINGS: Readonly<Record<CanonicalField, readonly string[]>> = {
  expocode: ['EXPOCODE'],
  woce_sect: ['SECT', 'WHP-ID', 'WOCE'],
  stnnbr: ['STNNBR'],
  castno: ['CASTNO'],
  parameters: ['PARAMETERS', 'PARAM', 'PARAMETER', 'PARAMS', 'PARAMATER', 'PARAMMETER'],
  comments: [
    'COM', 'COMM', 'COMME', 'COMMEN', 'COMMUNTS', 'COMMENTS',
    'COMMENT', 'COMMMENTS', 'MOORING', 'C', 'CO', 'COMMENTS\t',
  ],
  max_pressure: ['PRESS', 'PRESSURE'],
  wire: ['WIRE', 'OUT', 'WHEEL'],
  bottles: ['BOTTLES', 'BOTTLE'],
  height: ['BOTTOM', 'ALT'],
  lat: ['LATITUDE'],
  lon: ['LONGITUDE'],
  type: ['TYPE'],
  date: ['DATE'],
  time: ['TIME'],
  event: ['CODE'],
  nav: ['NAV'],
  depth: ['DEPTH'],
  corrected_depth: ['CDEPTH'],
};

function buildAliasTable(): ReadonlyMap<string, CanonicalField> {
  const table = new Map<string, CanonicalField>();
  for (const field of CANONICAL_FIELDS) {
    for (const spelling of FIELD_SPELLINGS[field]) {
      const existing = table.get(spelling);
      if (existing !== undefined && existing !== field) {
        throw new Error(`Header spelling ${JSON.stringify(spelling)} maps to both ${existing} and ${field}`);
      }
      table.set(spelling, field);
    }
  }
  return table;
}

export const ALIAS_TABLE: ReadonlyMap<string, CanonicalField> = buildAliasTable();

export function lookupAlias(label: string): CanonicalField | undefined {
  return ALIAS_TABLE.get(label);
}
