export * from './sum/index.js';
export { findSumFiles, readSumFile, scanSumFile, scanSumFiles } from './files/sumFiles.js';
export type { ScanFailure, ScanOk, ScanReport, ScanResult } from './files/sumFiles.js';
export { SumFileError } from './shared/index.js';
export type { ErrorCode } from './shared/index.js';
