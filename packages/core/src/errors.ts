/**
 * Fatal configuration problem found at startup. Aborts the run before any
 * deposit is touched; never retried automatically.
 */
export class ConfigurationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigurationError';
  }
}
