import { spawn } from 'child_process';
import { errnoCode, tail } from '../common/utils';

export interface BoundedRunOptions {
  command: string;
  args?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Wall-clock deadline measured from spawn (ms) */
  timeoutMs: number;
  /** External cancellation token */
  signal?: AbortSignal;
  /** Bytes of combined stdout/stderr kept for diagnostics */
  maxOutput?: number;
  /** How long to keep reading output after the process exits (ms) */
  drainMs?: number;
  onOutput?: (chunk: string) => void;
}

/** Longest delay a Node timer can hold; larger values fire at once */
export const MAX_TIMER_MS = 2 ** 31 - 1;

export type BoundedOutcome =
  | { kind: 'completed'; exitCode: number | null; signal: NodeJS.Signals | null; output: string; duration: number }
  | { kind: 'timed-out'; output: string; duration: number }
  | { kind: 'aborted'; output: string; duration: number };

/**
 * Run a child process in its own process group under a deadline.
 *
 * The deadline and the caller's signal feed one internal AbortController;
 * whichever fires first kills the whole group with SIGKILL. Timers and
 * listeners are released on every exit path. Rejects only when the
 * process cannot be spawned.
 *
 * The run ends when the process exits, not when its pipes close: a
 * background job it leaves behind keeps the pipes open, so output is read
 * for at most `drainMs` after exit and the pipes are then dropped.
 */
export function runBounded(options: BoundedRunOptions): Promise<BoundedOutcome> {
  const maxOutput = options.maxOutput ?? 64 * 1024;
  const drainMs = options.drainMs ?? 250;
  const timeoutMs = Math.min(options.timeoutMs, MAX_TIMER_MS);
  const started = Date.now();

  return new Promise((resolve, reject) => {
    const cancel = new AbortController();
    let reason: 'timed-out' | 'aborted' | null = null;
    let output = '';
    let settled = false;
    let drain: NodeJS.Timeout | undefined;

    const child = spawn(options.command, options.args ?? [], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    const killGroup = (): void => {
      const pid = child.pid;
      if (pid === undefined || child.exitCode !== null || child.signalCode !== null) {
        return;
      }
      try {
        process.kill(-pid, 'SIGKILL');
      } catch (error) {
        // ESRCH: the group is already gone
        if (errnoCode(error) !== 'ESRCH') {
          child.kill('SIGKILL');
        }
      }
    };

    const onCancel = (): void => {
      killGroup();
    };
    cancel.signal.addEventListener('abort', onCancel, { once: true });

    const deadline = setTimeout(() => {
      // Exited in time; the drain window settles the run
      if (child.exitCode !== null || child.signalCode !== null) return;
      reason ??= 'timed-out';
      cancel.abort();
    }, timeoutMs);

    const onExternalAbort = (): void => {
      reason ??= 'aborted';
      cancel.abort();
    };

    const release = (): void => {
      clearTimeout(deadline);
      clearTimeout(drain);
      cancel.signal.removeEventListener('abort', onCancel);
      options.signal?.removeEventListener('abort', onExternalAbort);
    };

    const finish = (outcome: BoundedOutcome): void => {
      if (settled) return;
      settled = true;
      release();
      resolve(outcome);
    };

    const collect = (chunk: Buffer): void => {
      const text = chunk.toString('utf8');
      output = tail(output + text, maxOutput);
      options.onOutput?.(text);
    };

    child.stdout?.on('data', collect);
    child.stderr?.on('data', collect);

    child.once('error', (error) => {
      if (settled) return;
      settled = true;
      release();
      reject(error);
    });

    const cancelled = (kind: 'timed-out' | 'aborted'): BoundedOutcome =>
      kind === 'timed-out'
        ? { kind: 'timed-out', output, duration: Date.now() - started }
        : { kind: 'aborted', output, duration: Date.now() - started };

    // Stray descendants may hold the pipes open; do not wait on them past the drain window
    child.once('exit', (exitCode: number | null, signal: NodeJS.Signals | null) => {
      if (reason !== null) {
        finish(cancelled(reason));
        return;
      }
      const duration = Date.now() - started;
      drain = setTimeout(() => {
        child.stdout?.destroy();
        child.stderr?.destroy();
        finish({ kind: 'completed', exitCode, signal, output, duration });
      }, drainMs);
    });

    child.once('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
      if (reason !== null) {
        finish(cancelled(reason));
        return;
      }
      finish({ kind: 'completed', exitCode, signal, output, duration: Date.now() - started });
    });

    if (options.signal) {
      if (options.signal.aborted) {
        onExternalAbort();
      } else {
        options.signal.addEventListener('abort', onExternalAbort, { once: true });
      }
    }
  });
}
