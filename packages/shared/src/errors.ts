/**
 * Raised when the environment does not satisfy the configuration schema.
 */
export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}
