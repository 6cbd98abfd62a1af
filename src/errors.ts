// Wellness Retention Engine - Error types
//
// Every operation failure surfaces as HTTP 500 with an "<Operation> failed"
// detail; these classes only let callers and tests tell the causes apart.

/** A model artifact or data file is missing or malformed. */
export class ModelNotLoadedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelNotLoadedError";
  }
}

/** The coach model answered with something that is not a usable JSON object. */
export class CoachResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CoachResponseError";
  }
}

/** One or more environment variables are missing or invalid. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
