/**
 * Error types surfaced by the public API
 */

export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION_INVALID';
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
