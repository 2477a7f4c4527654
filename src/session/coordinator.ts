/**
 * session/coordinator.ts
 *
 * Owns the interactive picker (rofi -dmenu) and keeps at most one alive
 * across all screenswitch processes of the user.
 *
 *   idle ──prompt()──▶ launching ──spawned, marker claimed──▶ active
 *     ▲                                                        │
 *     └──────────── picker exited, marker released ◀───────────┘
 *
 * Before launching, any picker named by the session marker is sent
 * SIGTERM and the marker discarded (supersede). A marker naming a dead
 * process or a different program is discarded without signalling.
 * A picker that ends through exit code 1 or SIGTERM was cancelled.
 *
 * prompt() also takes an AbortSignal. Once it fires, a picker that has
 * not been spawned yet is never spawned, and one that is already up
 * (or comes up afterwards) is sent SIGTERM.
 */

import * as path from 'path';
import { AppConfig, Preset } from '../core/types';
import { CommandResult, CommandRunner, RunningCommand } from '../core/exec';
import { PickerError, ScreenswitchError, SessionBusyError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { PresetChooser } from '../display/resolver';
import { findPreset, presetLabels } from '../display/presets';
import { ProcessTable } from './process_table';
import { SessionStore } from './store';

const log = scopedLogger('session/coordinator');

export type SessionState = 'idle' | 'launching' | 'active' | 'terminating';

/** rofi's exit code when the user hits Escape. */
const PICKER_ABORT_EXIT_CODE = 1;

/**
 * Maps a finished picker run to the selected line, or null when the
 * run was cancelled. Throws PickerError for any other failure.
 */
export function interpretPickerExit(result: CommandResult): string | null {
  if (result.timedOut) {
    log.warn({ command: result.command }, 'Picker timed out, treating as cancelled');
    return null;
  }
  if (result.exitCode === 0) {
    const selection = result.stdout.trim();
    return selection || null;
  }
  if (result.exitCode === PICKER_ABORT_EXIT_CODE || result.signal === 'SIGTERM') {
    return null;
  }

  const status = result.exitCode ?? result.signal;
  const stderr = result.stderr.trim();
  throw new PickerError(
    `Error selecting option: ${result.command} returned ${status}${stderr ? `\n${stderr}` : ''}`,
    { exitCode: result.exitCode, signal: result.signal, stderr }
  );
}

export class SessionCoordinator {
  private state: SessionState = 'idle';
  private active: RunningCommand | null = null;

  constructor(
    private readonly runner: CommandRunner,
    private readonly store: SessionStore,
    private readonly processes: ProcessTable,
    private readonly config: Pick<AppConfig, 'commands' | 'picker' | 'timeouts'>
  ) {}

  get currentState(): SessionState {
    return this.state;
  }

  /**
   * Terminates the picker named by the session marker, if it is alive
   * and really is the picker. Returns true when a signal was sent.
   */
  async supersede(): Promise<boolean> {
    const holder = await this.store.currentHolder();
    if (holder === undefined) return false;

    const info = await this.processes.inspect(holder);
    const expected = path.basename(this.config.commands.picker);
    if (!info.alive || info.program !== expected) {
      log.info({ pid: holder, alive: info.alive, program: info.program }, 'Discarding stale session marker');
      await this.store.release(holder);
      return false;
    }

    const ownSession = this.active?.pid === holder;
    if (ownSession) this.state = 'terminating';

    log.info({ pid: holder, ownSession }, 'Terminating running picker');
    const delivered = this.processes.signal(holder, 'SIGTERM');
    if (!delivered) {
      log.debug({ pid: holder }, 'Picker exited before it could be signalled');
    }
    await this.store.release(holder);
    return delivered;
  }

  /** Shows `options` under `label`; null when the user (or a newer session) cancels. */
  async prompt(options: string[], label: string, signal?: AbortSignal): Promise<string | null> {
    if (this.state !== 'idle') {
      throw new SessionBusyError(this.state);
    }
    if (signal?.aborted) {
      log.debug({ label }, 'Prompt aborted before launch');
      return null;
    }
    this.state = 'launching';

    const command = this.config.commands.picker;
    const args = ['-dmenu', '-p', label, ...this.config.picker.extraArgs];

    let running: RunningCommand;
    try {
      await this.supersede();
      running = await this.runner.start(command, args, {
        input: options.join('\n'),
        timeoutMs: this.config.timeouts.pickerMs
      });
    } catch (e) {
      this.state = 'idle';
      if (e instanceof ScreenswitchError && !(e instanceof PickerError)) {
        throw new PickerError(`Error selecting option: ${e.message}`, e.details);
      }
      throw e;
    }

    this.active = running;
    const abort = (): void => {
      log.info({ pid: running.pid, label }, 'Prompt aborted, terminating picker');
      running.kill('SIGTERM');
    };
    if (signal?.aborted) {
      abort();
    } else {
      signal?.addEventListener('abort', abort, { once: true });
    }

    let result: CommandResult;
    try {
      try {
        await this.store.claim(running.pid);
      } catch (e) {
        running.kill('SIGTERM');
        await running.result;
        throw e;
      }
      if (this.state === 'launching') this.state = 'active';
      log.debug({ pid: running.pid, label }, 'Picker active');

      result = await running.result;
    } finally {
      signal?.removeEventListener('abort', abort);
      this.active = null;
      await this.store.release(running.pid);
      this.state = 'idle';
    }

    return interpretPickerExit(result);
  }
}

/** Second-stage prompt: which placement to use for the chosen output(s). */
export class PickerPresetChooser implements PresetChooser {
  constructor(private readonly coordinator: SessionCoordinator) {}

  async choosePreset(signal?: AbortSignal): Promise<Preset | null> {
    const label = await this.coordinator.prompt(presetLabels(), 'config', signal);
    if (label === null) return null;

    const preset = findPreset(label);
    if (!preset) {
      // rofi lets the user type free text
      log.warn({ label }, 'Unknown preset entered, ignoring');
      return null;
    }
    return preset;
  }
}
