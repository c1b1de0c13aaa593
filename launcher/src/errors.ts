export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  config: 2,
  bootError: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** Base class for failures that end the process with a known exit code. */
export class LauncherError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class ConfigError extends LauncherError {
  constructor(message: string) {
    super(message, EXIT_CODES.config);
  }
}

/** The application object could not be imported or is not servable. */
export class AppLoadError extends LauncherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, EXIT_CODES.bootError, options);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
  }
  return String(error);
}
