export {
  SumFileError,
  invalidFormat,
  unknownColumn,
  ambiguousLayout,
  columnCountMismatch,
  invalidParams,
  notFound,
} from './errors.js';
export type { ErrorCode } from './errors.js';
