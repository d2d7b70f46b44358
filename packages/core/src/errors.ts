/**
 * Typed errors thrown by library code. The CLI maps any of these to a
 * red message on stderr and a non-zero exit.
 */

export class ClockworkError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'ClockworkError';
  }
}

/** Input that is not valid JSON or does not have the expected shape */
export class InputError extends ClockworkError {
  constructor(message: string) {
    super(message, 'INPUT_INVALID');
    this.name = 'InputError';
  }
}

/** A required identity or setting could not be resolved */
export class ConfigError extends ClockworkError {
  constructor(
    message: string,
    public readonly hint?: string
  ) {
    super(hint ? `${message}\n${hint}` : message, 'CONFIG_MISSING');
    this.name = 'ConfigError';
  }
}

/** An external command (gh, git) failed in a way we cannot treat as "no data" */
export class CollaboratorError extends ClockworkError {
  constructor(
    message: string,
    public readonly command: string
  ) {
    super(message, 'COLLABORATOR_FAILED');
    this.name = 'CollaboratorError';
  }
}

/** Narrow an unknown thrown value to a printable message */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
