export type ErrorCode =
  | 'INVALID_FORMAT'
  | 'UNKNOWN_COLUMN'
  | 'AMBIGUOUS_LAYOUT'
  | 'COLUMN_COUNT_MISMATCH'
  | 'INVALID_PARAMS'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

const STRUCTURAL_BY_CODE: Record<ErrorCode, boolean> = {
  INVALID_FORMAT: true,
  UNKNOWN_COLUMN: true,
  AMBIGUOUS_LAYOUT: true,
  COLUMN_COUNT_MISMATCH: true,
  INVALID_PARAMS: false,
  NOT_FOUND: false,
  INTERNAL_ERROR: false,
};

export class SumFileError extends Error {
  /** True for errors raised while decoding a file, as opposed to tool or path errors. */
  readonly structural: boolean;

  constructor(
    public code: ErrorCode,
    message: string,
    public data?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SumFileError';
    this.structural = STRUCTURAL_BY_CODE[code];
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }
}

export function invalidFormat(message: string, data?: Record<string, unknown>): SumFileError {
  return new SumFileError('INVALID_FORMAT', message, data);
}

export function unknownColumn(label: string): SumFileError {
  return new SumFileError('UNKNOWN_COLUMN', `Unknown column label: ${JSON.stringify(label)}`, { label });
}

export function ambiguousLayout(message: string, data?: Record<string, unknown>): SumFileError {
  return new SumFileError('AMBIGUOUS_LAYOUT', message, data);
}

export function columnCountMismatch(expected: number, found: number): SumFileError {
  return new SumFileError(
    'COLUMN_COUNT_MISMATCH',
    `Body has ${found} columns, header layout expects ${expected}`,
    { expected, found },
  );
}

export function invalidParams(message: string, data?: Record<string, unknown>): SumFileError {
  return new SumFileError('INVALID_PARAMS', message, data);
}

export function notFound(message: string, data?: Record<string, unknown>): SumFileError {
  return new SumFileError('NOT_FOUND', message, data);
}
