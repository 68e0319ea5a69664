import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ScriptAbortedError,
  ScriptDecodeError,
  ScriptExitError,
  ScriptSpawnError,
  ScriptTimeoutError,
  errorMessage
} from '../common/errors';
import { Logger, defaultLogger } from '../common/logger';
import { DEFAULT_SCRIPT_TIMEOUT_SECONDS } from '../config/ConfiguratorConfig';
import { BoundedOutcome, runBounded } from './BoundedProcess';

export enum ScriptState {
  NOT_STARTED = 'not_started',
  SKIPPED = 'skipped',
  RUNNING = 'running',
  COMPLETED = 'completed',
  TIMED_OUT = 'timed_out',
  ABORTED = 'aborted',
  FAILED = 'failed'
}

export interface ScriptRunResult {
  state: ScriptState;
  exitCode?: number | null;
  duration?: number;
}

export interface ScriptRunnerOptions {
  /** Deadline used when the override document sets none (seconds) */
  defaultTimeout?: number;
  /** Interpreter for scripts without a shebang line */
  interpreter?: string;
  /** Parent directory for the per-run staging directory */
  tmpDir?: string;
  signal?: AbortSignal;
  logger?: Logger;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Strict base64 decode: Buffer.from silently skips bad characters
 */
export function decodeScript(encoded: string): string {
  const compact = encoded.replace(/\s+/g, '');
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new ScriptDecodeError('post_configuration_script is not valid base64');
  }
  return Buffer.from(compact, 'base64').toString('utf8');
}

/**
 * Runs the operator's one-shot post-configuration script.
 *
 * NotStarted -> Running -> Completed(code) | TimedOut | Aborted | Failed,
 * where Failed means the script never started. Only Completed(0)
 * resolves; every other terminal state rejects with a typed error. The
 * staging directory is removed whichever way the run ends.
 */
export class ScriptRunner extends EventEmitter {
  private state: ScriptState = ScriptState.NOT_STARTED;
  private readonly defaultTimeout: number;
  private readonly interpreter: string;
  private readonly tmpDir: string;
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;

  constructor(options: ScriptRunnerOptions = {}) {
    super();
    this.defaultTimeout = options.defaultTimeout ?? DEFAULT_SCRIPT_TIMEOUT_SECONDS;
    this.interpreter = options.interpreter ?? '/bin/bash';
    this.tmpDir = options.tmpDir ?? os.tmpdir();
    this.signal = options.signal;
    this.logger = options.logger ?? defaultLogger;
  }

  getState(): ScriptState {
    return this.state;
  }

  async run(encodedScript?: string, timeoutSeconds?: number): Promise<ScriptRunResult> {
    if (encodedScript === undefined || encodedScript.trim() === '') {
      this.logger.info('No post configuration script supplied');
      this.transition(ScriptState.SKIPPED);
      return { state: this.state };
    }

    const script = decodeScript(encodedScript);
    const timeout = timeoutSeconds ?? this.defaultTimeout;
    const workDir = await fs.mkdtemp(path.join(this.tmpDir, 'scylla-post-configure-'));

    try {
      const scriptPath = path.join(workDir, 'post_configuration_script');
      await fs.writeFile(scriptPath, script, { encoding: 'utf8', mode: 0o700 });
      await fs.chmod(scriptPath, 0o755);

      const [command, args]: [string, string[]] = script.startsWith('#!')
        ? [scriptPath, []]
        : [this.interpreter, [scriptPath]];

      this.logger.info('Running post configuration script', { timeout });
      this.transition(ScriptState.RUNNING);

      let outcome: BoundedOutcome;
      try {
        outcome = await runBounded({
          command,
          args,
          timeoutMs: timeout * 1000,
          ...(this.signal ? { signal: this.signal } : {})
        });
      } catch (error) {
        this.transition(ScriptState.FAILED);
        this.logger.error('Post configuration script could not be started', { command, error: errorMessage(error) });
        throw new ScriptSpawnError(command, { cause: error });
      }

      return this.settle(outcome, timeout);
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  private settle(outcome: BoundedOutcome, timeout: number): ScriptRunResult {
    switch (outcome.kind) {
      case 'timed-out':
        this.transition(ScriptState.TIMED_OUT);
        this.logger.error('Post configuration script timed out, process group killed', {
          timeout,
          output: outcome.output
        });
        throw new ScriptTimeoutError(timeout, outcome.output);

      case 'aborted':
        this.transition(ScriptState.ABORTED);
        this.logger.error('Post configuration script aborted, process group killed');
        throw new ScriptAbortedError();

      case 'completed':
        this.transition(ScriptState.COMPLETED);
        if (outcome.exitCode !== 0) {
          this.logger.error('Post configuration script failed', {
            exitCode: outcome.exitCode,
            signal: outcome.signal,
            output: outcome.output
          });
          throw new ScriptExitError(outcome.exitCode, outcome.signal, outcome.output);
        }
        this.logger.info('Post configuration script completed', { duration: outcome.duration });
        return { state: this.state, exitCode: 0, duration: outcome.duration };
    }
  }

  private transition(next: ScriptState): void {
    const previous = this.state;
    this.state = next;
    this.emit('state-changed', { from: previous, to: next });
  }
}
