export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class NavigationError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "NavigationError";
  }
}

export class LLMError extends Error {
  constructor(message: string, public code: string, public retryable = false) {
    super(message);
    this.name = "LLMError";
  }
}

export class UsageError extends Error {
  constructor(message: string, public usage?: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class InterpretationError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "InterpretationError";
  }
}

export class NoPlatformsResolvedError extends Error {
  constructor(public platformSpec: string, public unmatched: string[]) {
    super(`No platforms could be resolved from "${platformSpec}"`);
    this.name = "NoPlatformsResolvedError";
  }
}

export class ExtractionError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "ExtractionError";
  }
}

export class AllPlatformsFailedError extends Error {
  constructor(public failures: Array<{ platform: string; error: string }>) {
    super(`All ${failures.length} platform(s) failed: ${failures.map((f) => `${f.platform} (${f.error})`).join("; ")}`);
    this.name = "AllPlatformsFailedError";
  }
}

export class MissingCredentialsError extends Error {
  constructor(public variable: string) {
    super(`${variable} is not set. Export it or add it to a .env file.`);
    this.name = "MissingCredentialsError";
  }
}

export class CommandNotFoundError extends Error {
  constructor(public command: string) {
    super(`Unknown command: ${command}`);
    this.name = "CommandNotFoundError";
  }
}

/**
 * Errors that end a command with a non-zero exit. Everything else raised
 * inside the scrape loop is absorbed and logged where it happens.
 */
export function isFatalCommandError(error: unknown): boolean {
  return (
    error instanceof InterpretationError ||
    error instanceof NoPlatformsResolvedError ||
    error instanceof AllPlatformsFailedError ||
    error instanceof MissingCredentialsError
  );
}
