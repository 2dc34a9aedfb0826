export class AppError extends Error {
  readonly code: string;
  readonly details?: unknown;

  constructor(code: string, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super('invalid_config', message, details);
  }
}

export class InputFormatError extends AppError {
  readonly path: string;

  constructor(path: string, message: string, details?: unknown) {
    super('invalid_input', `${path}: ${message}`, details);
    this.path = path;
  }
}

export class StatementError extends AppError {
  readonly statement: string;

  constructor(statement: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('statement_failed', `statement failed: ${reason}`, { sqlState: sqlState(cause) }, { cause });
    this.statement = statement;
  }
}

export class MarkupNameError extends AppError {
  readonly column: string;

  constructor(column: string) {
    super('invalid_element_name', `column "${column}" is not a valid element name`);
    this.column = column;
  }
}

// Serialization failures surface as TypeError, like JSON.stringify's own.
export class UnsupportedValueError extends TypeError {
  readonly valueType: string;

  constructor(valueType: string) {
    super(`Object of type ${valueType} is not serializable`);
    this.name = 'UnsupportedValueError';
    this.valueType = valueType;
  }
}

export const DUPLICATE_DATABASE = '42P04';
export const UNDEFINED_TABLE = '42P01';

export function sqlState(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'string' && /^[0-9A-Z]{5}$/.test(code)) {
      return code;
    }
  }
  return null;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
