export type FieldErrors = Record<string, string[]>;

export class ValidationError extends Error {
  readonly details: FieldErrors;

  constructor(message: string, details: FieldErrors = {}) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }

  static forField(field: string, message: string) {
    return new ValidationError(message, { [field]: [message] });
  }
}

export class NotFoundError extends Error {
  constructor(message = 'Not found') {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Raised when a write would break an inventory rule (duplicate names, unavailable colors). */
export class BusinessRuleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BusinessRuleError';
  }
}

export class UnauthorizedError extends Error {
  constructor(message = 'Authentication required') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}
