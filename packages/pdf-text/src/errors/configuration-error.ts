/**
 * ConfigurationError
 *
 * Thrown when an external tool location needed by the current operation is
 * missing or invalid. Fatal for the whole batch.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}
