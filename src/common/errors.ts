/**
 * Typed failures raised by the configurator core.
 *
 * The core never terminates the process itself; callers (the CLI) decide
 * what a fatal error means for the boot sequence.
 */

export type ConfigureErrorCode =
  | 'METADATA_FETCH'
  | 'OVERRIDE_PARSE'
  | 'CONFIG_FILE'
  | 'SCRIPT_DECODE'
  | 'SCRIPT_TIMEOUT'
  | 'SCRIPT_EXIT'
  | 'SCRIPT_SPAWN'
  | 'SCRIPT_ABORTED';

export class ConfigureError extends Error {
  readonly code: ConfigureErrorCode;

  constructor(code: ConfigureErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MetadataFetchError extends ConfigureError {
  constructor(
    readonly path: string,
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super('METADATA_FETCH', message, options);
  }

  /**
   * Transport failures and 5xx answers may succeed on a later attempt
   */
  get isTransient(): boolean {
    return this.statusCode === undefined || this.statusCode >= 500;
  }
}

export class OverrideParseError extends ConfigureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('OVERRIDE_PARSE', message, options);
  }
}

export class ConfigFileError extends ConfigureError {
  constructor(readonly filePath: string, message: string, options?: { cause?: unknown }) {
    super('CONFIG_FILE', message, options);
  }
}

export class ScriptDecodeError extends ConfigureError {
  constructor(message: string) {
    super('SCRIPT_DECODE', message);
  }
}

export class ScriptTimeoutError extends ConfigureError {
  constructor(readonly timeoutSeconds: number, readonly output: string) {
    super('SCRIPT_TIMEOUT', `Post configuration script timed out after ${timeoutSeconds}s`);
  }
}

export class ScriptExitError extends ConfigureError {
  constructor(
    readonly exitCode: number | null,
    readonly signal: NodeJS.Signals | null,
    readonly output: string
  ) {
    super(
      'SCRIPT_EXIT',
      signal
        ? `Post configuration script was terminated by ${signal}`
        : `Post configuration script failed with exit code ${exitCode}`
    );
  }
}

export class ScriptSpawnError extends ConfigureError {
  constructor(readonly command: string, options?: { cause?: unknown }) {
    super('SCRIPT_SPAWN', `Post configuration script could not be started: ${errorMessage(options?.cause)}`, options);
  }
}

export class ScriptAbortedError extends ConfigureError {
  constructor() {
    super('SCRIPT_ABORTED', 'Post configuration script was aborted');
  }
}

export function isConfigureError(error: unknown): error is ConfigureError {
  return error instanceof ConfigureError;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
