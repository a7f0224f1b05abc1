/**
 * ConfigError
 *
 * Thrown when environment variables or command-line options are invalid.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
    // Restore prototype chain for instanceof checks when targeting ES5
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
