/**
 * Thrown when an index is constructed with parameters it cannot work with,
 * such as a degree below 2.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
