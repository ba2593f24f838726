export const ErrorCodes = {
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  FILE_ACCESS_DENIED: 'FILE_ACCESS_DENIED',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',
  FILE_FORMAT_INVALID: 'FILE_FORMAT_INVALID',
  FILE_CORRUPTED: 'FILE_CORRUPTED',

  VALIDATION_FAILED: 'VALIDATION_FAILED',
  REQUIRED_FIELD_MISSING: 'REQUIRED_FIELD_MISSING',
  FIELD_TYPE_MISMATCH: 'FIELD_TYPE_MISMATCH',
  FIELD_VALUE_INVALID: 'FIELD_VALUE_INVALID',
  FIELD_CONSTRAINT_VIOLATION: 'FIELD_CONSTRAINT_VIOLATION',
  INVALID_CELL_REFERENCE: 'INVALID_CELL_REFERENCE',

  PROCESSING_FAILED: 'PROCESSING_FAILED',
  TYPE_CONVERSION_FAILED: 'TYPE_CONVERSION_FAILED',
  DATA_EXTRACTION_FAILED: 'DATA_EXTRACTION_FAILED',
  SCHEMA_PROCESSING_FAILED: 'SCHEMA_PROCESSING_FAILED',

  SCHEMA_INVALID: 'SCHEMA_INVALID',
  SCHEMA_NOT_FOUND: 'SCHEMA_NOT_FOUND',
  SCHEMA_FIELD_MISSING: 'SCHEMA_FIELD_MISSING',

  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_MISSING: 'CONFIG_MISSING',
  CONFIG_VALUE_INVALID: 'CONFIG_VALUE_INVALID',

  DATA_MALFORMED: 'DATA_MALFORMED',
  DATA_TYPE_INVALID: 'DATA_TYPE_INVALID',
  DATA_VALUE_INVALID: 'DATA_VALUE_INVALID',

  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class ExcelProcessingError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.UNKNOWN_ERROR,
    details?: Record<string, unknown>,
    cause?: unknown,
    isOperational: boolean = true
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details ?? {},
      cause: this.cause === undefined ? undefined : toErrorMessage(this.cause),
    };
  }
}

export class FileError extends ExcelProcessingError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, code: ErrorCode = ErrorCodes.FILE_FORMAT_INVALID, cause?: unknown) {
    super(message, code, { filePath }, cause);
    this.filePath = filePath;
  }
}

export class ValidationError extends ExcelProcessingError {
  constructor(message: string, code: ErrorCode = ErrorCodes.VALIDATION_FAILED, details?: Record<string, unknown>) {
    super(message, code, details);
  }
}

export class InvalidAddressError extends ValidationError {
  public readonly address: string;

  constructor(address: string, reason: string) {
    super(`Invalid cell address '${address}': ${reason}`, ErrorCodes.INVALID_CELL_REFERENCE, { address, reason });
    this.address = address;
  }
}

export class ProcessingError extends ExcelProcessingError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.PROCESSING_FAILED,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, code, details, cause);
  }
}

export class SchemaError extends ExcelProcessingError {
  public readonly schemaName?: string;

  constructor(message: string, schemaName?: string, code: ErrorCode = ErrorCodes.SCHEMA_INVALID, details?: Record<string, unknown>) {
    super(message, code, { ...details, schemaName });
    this.schemaName = schemaName;
  }
}

export class ConfigurationError extends ExcelProcessingError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = ErrorCodes.CONFIG_VALUE_INVALID) {
    super(message, code, details, undefined, false);
  }
}

export class DataError extends ExcelProcessingError {
  public readonly fieldName?: string;

  constructor(message: string, fieldName?: string, code: ErrorCode = ErrorCodes.DATA_MALFORMED, details?: Record<string, unknown>) {
    super(message, code, { ...details, fieldName });
    this.fieldName = fieldName;
  }
}

export const isExcelProcessingError = (error: unknown): error is ExcelProcessingError => {
  return error instanceof ExcelProcessingError;
};

export const isOperationalError = (error: unknown): boolean => {
  if (error instanceof ExcelProcessingError) {
    return error.isOperational;
  }
  return false;
};

export const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
};
