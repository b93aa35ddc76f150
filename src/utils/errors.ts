export class LawFirmError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LawFirmError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends LawFirmError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[], options?: ErrorOptions) {
    super(message, 'VALIDATION_ERROR', options);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class StorageError extends LawFirmError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'STORAGE_ERROR', options);
    this.name = 'StorageError';
  }
}

export class ConfigError extends LawFirmError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
