export class EngineLifecycleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineLifecycleError';
  }
}

export class ConfigurationError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
