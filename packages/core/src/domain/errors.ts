export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * The synthesizer cannot be initialized or reached at all. Unlike a malformed
 * answer this is never retried by the assembly loop.
 */
export class GeneratorUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GeneratorUnavailableError';
  }
}

export class IngestionError extends Error {
  public readonly source?: string;

  constructor(message: string, source?: string) {
    super(message);
    this.name = 'IngestionError';
    this.source = source;
  }
}
