/**
 * Raised when an environment variable holds a value the CLI cannot use.
 */
export class SettingsError extends Error {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = 'SettingsError';
    this.variable = variable;
  }
}
