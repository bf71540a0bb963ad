/**
 * Raised for any configuration problem found at startup. Fatal: the service
 * must not start serving with an invalid digest configuration.
 */
export class ConfigurationError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = "ConfigurationError";
  }
}
