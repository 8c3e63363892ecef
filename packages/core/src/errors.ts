/**
 * Fatal, user-facing failures. Anything that is not an OperationalError is a
 * programming error and should surface as such.
 */
export class OperationalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OperationalError';
  }
}

export class ConfigLoadError extends OperationalError {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export interface SchemaIssueDetail {
  pointer: string;
  constraint: string;
  message: string;
}

export class SchemaValidationError extends OperationalError {
  public readonly pointer: string;
  public readonly constraint: string;

  constructor(public readonly issues: SchemaIssueDetail[]) {
    const [first] = issues;
    super(first ? `Invalid configuration at ${first.pointer}: ${first.message}` : 'Invalid configuration');
    this.name = 'SchemaValidationError';
    this.pointer = first?.pointer ?? '/';
    this.constraint = first?.constraint ?? 'unknown';
  }
}

export class DeprecationConflictError extends OperationalError {
  constructor(message: string, public readonly currentKey: string, public readonly deprecatedKey: string) {
    super(message);
    this.name = 'DeprecationConflictError';
  }
}

export class ConsistencyError extends OperationalError {
  constructor(message: string, public readonly rule: string) {
    super(message);
    this.name = 'ConsistencyError';
  }
}

export class DirectoryNotFoundError extends OperationalError {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = 'DirectoryNotFoundError';
  }
}

export const isOperationalError = (error: unknown): error is OperationalError =>
  error instanceof OperationalError;
