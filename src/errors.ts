export type ConfigErrorCode = 'MissingField' | 'InvalidType' | 'InvalidDateFormat' | 'InvalidRange';

/**
 * Raised while validating a holiday or vacation document, before any day is classified.
 */
export class ConfigValidationError extends Error {
  readonly code: ConfigErrorCode;
  readonly field?: string;

  constructor(code: ConfigErrorCode, message: string, field?: string) {
    super(message);
    this.name = 'ConfigValidationError';
    this.code = code;
    this.field = field;
  }
}

export class InvalidDateFormatError extends ConfigValidationError {
  readonly value: unknown;

  constructor(value: unknown, field?: string) {
    super('InvalidDateFormat', `Invalid date format: ${String(value)} (expected YYYY-MM-DD)`, field);
    this.name = 'InvalidDateFormatError';
    this.value = value;
  }
}

export class ConfigNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigNotFoundError';
  }
}
