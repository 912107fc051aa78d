export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed - ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
