/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every throw site uses one of these.
 * The `code` property is what the apply cycle logs and what the
 * CLI uses to pick its exit code.
 */

export class ScreenswitchError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

// ---------------------------------------------------------------------------
// Inventory errors
// ---------------------------------------------------------------------------

/** `xrandr --verbose` could not be run, or its report could not be parsed. */
export class QueryError extends ScreenswitchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'QUERY_ERROR', details);
  }
}

// ---------------------------------------------------------------------------
// Resolver errors
// ---------------------------------------------------------------------------

/** The connected outputs do not match any shape the presentation layout supports. */
export class TopologyAmbiguousError extends ScreenswitchError {
  readonly outputs: string[];

  constructor(reason: string, outputs: string[]) {
    super(
      `${reason}: ${outputs.join(', ')}`,
      'TOPOLOGY_AMBIGUOUS',
      { outputs }
    );
    this.outputs = outputs;
  }
}

// ---------------------------------------------------------------------------
// External tool errors
// ---------------------------------------------------------------------------

/** xrandr rejected the batch (non-zero exit). */
export class ApplyError extends ScreenswitchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'APPLY_ERROR', details);
  }
}

/** The picker exited abnormally for a reason other than cancellation. */
export class PickerError extends ScreenswitchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PICKER_ERROR', details);
  }
}

/** A second picker was requested while this process already shows one. */
export class SessionBusyError extends ScreenswitchError {
  constructor(state: string) {
    super(`A picker session is already ${state}`, 'SESSION_BUSY', { state });
  }
}

/** A command could not be spawned or exceeded its wall-clock budget. */
export class CommandError extends ScreenswitchError {
  constructor(command: string, message: string, details?: Record<string, unknown>) {
    super(message, 'COMMAND_ERROR', { command, ...details });
  }
}

// ---------------------------------------------------------------------------
// Configuration errors
// ---------------------------------------------------------------------------

/** The config file is unreadable or fails schema validation. */
export class ConfigError extends ScreenswitchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

/** The errno-style `code` of a Node.js system error, if any. */
export function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}

/** Renders any thrown value as a message suitable for a notification. */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
