export class ExternalServiceError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'ExternalServiceError';
  }
}

export class InvalidInputError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Raised when the ledger or claim store cannot be written. Ledger durability is
 * a hard guarantee, so callers treat this as fatal.
 */
export class PersistenceError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly details: readonly string[] = [],
  ) {
    super(details.length > 0 ? `${message}\n${details.join('\n')}` : message);
    this.name = 'ConfigError';
  }
}
