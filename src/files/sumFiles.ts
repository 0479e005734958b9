import * as fs from 'fs';
import * as path from 'path';
import { SumFileError } from '../shared/index.js';
import { groupCasts, openSum, type CanonicalField, type OpenedSum, type ReadSumOptions } from '../sum/index.js';

/** CCHDO names sum files *.sum or *su.txt. */
const SUM_FILE_SUFFIXES = ['.sum', 'su.txt'] as const;

export interface ScanOk {
  path: string;
  status: 'ok';
  fields: CanonicalField[];
  row_count: number;
  cast_count: number;
}

export interface ScanFailure {
  path: string;
  status: 'error';
  code: SumFileError['code'];
  message: string;
}

export type ScanResult = ScanOk | ScanFailure;

export interface ScanReport {
  root: string;
  file_count: number;
  ok_count: number;
  error_count: number;
  files: ScanResult[];
}

export function isSumFileName(name: string): boolean {
  const lower = name.toLowerCase();
  return SUM_FILE_SUFFIXES.some(suffix => lower.endsWith(suffix));
}

export function findSumFiles(root: string): string[] {
  const out: string[] = [];
  const walk = (dir: string): void => {
    const entries = fs.readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) walk(full);
      else if (entry.isFile() && isSumFileName(entry.name)) out.push(full);
    }
  };
  walk(root);
  return out;
}

export function readSumFile(filePath: string, options: ReadSumOptions = {}): OpenedSum {
  return openSum(fs.readFileSync(filePath), options);
}

export function scanSumFile(filePath: string, options: ReadSumOptions = {}): ScanResult {
  try {
    const { layout, rows } = readSumFile(filePath, options);
    const decoded = [...rows];
    return {
      path: filePath,
      status: 'ok',
      fields: layout.fields,
      row_count: decoded.length,
      cast_count: groupCasts(decoded).length,
    };
  } catch (err) {
    if (err instanceof SumFileError && err.structural) {
      return { path: filePath, status: 'error', code: err.code, message: err.message };
    }
    throw err;
  }
}

export function scanSumFiles(root: string, options: ReadSumOptions = {}): ScanReport {
  const emptyCols = [...(options.emptyCols ?? [])];
  const files = findSumFiles(root).map(filePath => scanSumFile(filePath, { emptyCols }));
  const okCount = files.filter(result => result.status === 'ok').length;
  return {
    root,
    file_count: files.length,
    ok_count: okCount,
    error_count: files.length - okCount,
    files,
  };
}
