/**
 * Error types raised by projlens. Each carries a stable code the CLI maps to an exit status.
 */

export class ProjlensError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "ProjlensError";
  }
}

/** Malformed input or a missing required value. Names the offending input in its message. */
export class InvalidArgumentError extends ProjlensError {
  constructor(message: string, details?: unknown) {
    super(message, "INVALID_ARGUMENT", details);
    this.name = "InvalidArgumentError";
  }
}

export class InvalidStateError extends ProjlensError {
  constructor(message: string, details?: unknown) {
    super(message, "INVALID_STATE", details);
    this.name = "InvalidStateError";
  }
}

export class ConfigError extends ProjlensError {
  constructor(message: string, details?: unknown) {
    super(message, "INVALID_CONFIG", details);
    this.name = "ConfigError";
  }
}

export class GitCommandError extends ProjlensError {
  constructor(message: string, details?: unknown) {
    super(message, "GIT_COMMAND_FAILED", details);
    this.name = "GitCommandError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
