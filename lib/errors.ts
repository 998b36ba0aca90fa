/**
 * Raised while an environment is being composed, before anything is
 * synthesised, when a setting that the selected mode depends on is absent
 * or invalid. Aborts the whole pass for that environment.
 */
export class ConfigurationError extends Error {
  /** Dotted path of the offending setting, e.g. `database.connectionSecretArn`. */
  public readonly field: string;
  /** The mode or context that required it, e.g. `database.useExisting=true`. */
  public readonly mode: string;

  constructor(field: string, mode: string, detail?: string) {
    super(
      detail
        ? `Invalid configuration: ${field} (${mode}): ${detail}`
        : `Invalid configuration: ${field} is required when ${mode}`,
    );
    this.name = 'ConfigurationError';
    this.field = field;
    this.mode = mode;
  }
}
