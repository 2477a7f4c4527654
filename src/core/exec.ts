/**
 * core/exec.ts
 *
 * The one place that spawns external programs. Every collaborator
 * (xrandr, rofi, notify-send, herbstclient, ...) is reached through the
 * CommandRunner interface so tests can swap in an in-process fake.
 *
 * Each run is bounded: when `timeoutMs` elapses the child gets SIGTERM,
 * then SIGKILL after the runner's grace period.
 */

import { spawn } from 'child_process';
import { CommandError } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/exec');

export interface CommandResult {
  command: string;
  args: string[];
  exitCode: number | null;                 // null when the child was killed by a signal
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface StartOptions {
  input?: string;                          // written to stdin, which is then closed
  timeoutMs?: number;
}

export interface RunningCommand {
  readonly pid: number;
  kill(signal?: NodeJS.Signals): boolean;
  readonly result: Promise<CommandResult>;
}

export interface CommandRunner {
  /** Resolves once the child is spawned; rejects with CommandError if it cannot be. */
  start(command: string, args: string[], options?: StartOptions): Promise<RunningCommand>;
  run(command: string, args: string[], options?: StartOptions): Promise<CommandResult>;
  /** Fire-and-forget launch that outlives this process. */
  launchDetached(command: string, args: string[]): void;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ');
}

/** Diagnostic text for a failed run: stderr if any, otherwise how it ended. */
export function describeFailure(result: CommandResult): string {
  const stderr = result.stderr.trim();
  if (stderr) return stderr;
  if (result.timedOut) return `${result.command} timed out`;
  if (result.signal) return `${result.command} was killed by ${result.signal}`;
  return `${result.command} exited with code ${result.exitCode}`;
}

export class ChildProcessRunner implements CommandRunner {
  constructor(private readonly killGraceMs = 2000) {}

  start(command: string, args: string[], options: StartOptions = {}): Promise<RunningCommand> {
    return new Promise<RunningCommand>((resolveStart, rejectStart) => {
      const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';
      let started = false;
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;

      const clearTimers = () => {
        if (timer) clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
      };

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => { stdout += chunk; });
      child.stderr.on('data', (chunk: string) => { stderr += chunk; });
      child.stdin.on('error', (e) => {
        // The child may exit without reading its input (EPIPE)
        log.debug({ command, error: e.message }, 'stdin closed early');
      });

      const result = new Promise<CommandResult>((resolve, reject) => {
        child.on('close', (exitCode, signal) => {
          clearTimers();
          resolve({ command, args, exitCode, signal, stdout, stderr, timedOut });
        });
        child.on('error', (e) => {
          clearTimers();
          // Spawn failures are reported through rejectStart instead
          if (started) reject(new CommandError(command, e.message));
        });
      });

      child.once('error', (e: NodeJS.ErrnoException) => {
        if (started) return;
        rejectStart(new CommandError(command, `Cannot run ${command}: ${e.message}`, { errno: e.code }));
      });

      child.once('spawn', () => {
        started = true;
        const pid = child.pid ?? -1;
        log.debug({ command: formatCommand(command, args), pid }, 'Spawned');

        child.stdin.end(options.input);

        if (options.timeoutMs !== undefined) {
          const timeoutMs = options.timeoutMs;
          timer = setTimeout(() => {
            timedOut = true;
            log.warn({ command, pid, timeoutMs }, 'Command timed out, terminating');
            child.kill('SIGTERM');
            killTimer = setTimeout(() => child.kill('SIGKILL'), this.killGraceMs);
          }, timeoutMs);
        }

        resolveStart({
          pid,
          kill: (signal: NodeJS.Signals = 'SIGTERM') => child.kill(signal),
          result
        });
      });
    });
  }

  async run(command: string, args: string[], options: StartOptions = {}): Promise<CommandResult> {
    const running = await this.start(command, args, options);
    return running.result;
  }

  launchDetached(command: string, args: string[]): void {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.on('error', (e) => {
      log.warn({ command: formatCommand(command, args), error: e.message }, 'Detached launch failed');
    });
    child.unref(); // let the parent exit without waiting
  }
}
