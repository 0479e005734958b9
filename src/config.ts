import * as fs from 'fs';
import * as path from 'path';
import { invalidParams, notFound } from './shared/index.js';

export const SUMFILE_DATA_DIR_ENV = 'SUMFILE_DATA_DIR';
export const SUMFILE_TOOL_MODE_ENV = 'SUMFILE_TOOL_MODE';
export const SUMFILE_LOG_LEVEL_ENV = 'SUMFILE_LOG_LEVEL';

export type PathKind = 'file' | 'directory';

export function getDataDirFromEnv(): string | undefined {
  const raw = process.env[SUMFILE_DATA_DIR_ENV];
  if (!raw || raw.trim().length === 0) return undefined;

  const trimmed = raw.trim();
  if (!path.isAbsolute(trimmed)) {
    throw invalidParams(`${SUMFILE_DATA_DIR_ENV} must be an absolute path`, { env: SUMFILE_DATA_DIR_ENV, value: trimmed });
  }

  const resolved = path.resolve(trimmed);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
    throw invalidParams(`${SUMFILE_DATA_DIR_ENV} must point to an existing directory`, {
      env: SUMFILE_DATA_DIR_ENV,
      value: resolved,
    });
  }
  return resolved;
}

function isInside(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === '') return true;
  const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
  return !escapes && !path.isAbsolute(relative);
}

/**
 * Resolve a caller-supplied path. With SUMFILE_DATA_DIR set, relative paths
 * are taken from it and nothing outside it is reachable; otherwise the path
 * must be absolute.
 */
export function resolveInputPath(raw: string, kind: PathKind): string {
  const dataDir = getDataDirFromEnv();

  let resolved: string;
  if (dataDir) {
    resolved = path.resolve(dataDir, raw);
    if (!isInside(dataDir, resolved)) {
      throw invalidParams(`Path is outside ${SUMFILE_DATA_DIR_ENV}`, { path: raw, data_dir: dataDir });
    }
  } else {
    if (!path.isAbsolute(raw)) {
      throw invalidParams(`Path must be absolute when ${SUMFILE_DATA_DIR_ENV} is not set`, { path: raw });
    }
    resolved = path.resolve(raw);
  }

  if (!fs.existsSync(resolved)) {
    throw notFound(`No such ${kind}: ${resolved}`, { path: resolved });
  }
  const stat = fs.statSync(resolved);
  const matches = kind === 'file' ? stat.isFile() : stat.isDirectory();
  if (!matches) {
    throw invalidParams(`Expected a ${kind}: ${resolved}`, { path: resolved });
  }
  return resolved;
}
