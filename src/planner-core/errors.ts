/**
 * Raised when the rule pack is missing an entry the engines depend on, or when
 * two pack files disagree. Never raised for malformed user input.
 */
export class ConfigurationError extends Error {
  readonly source: string | null;

  constructor(message: string, source: string | null = null) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'ConfigurationError';
    this.source = source;
  }
}
