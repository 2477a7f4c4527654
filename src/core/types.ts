/**
 * core/types.ts
 *
 * Single source of truth for every shared type in the project.
 * All modules import from here. Nothing defines its own DTOs.
 */

// ---------------------------------------------------------------------------
// Outputs
// ---------------------------------------------------------------------------

/** Semantic classification of an output identity. */
export type Role =
  | { kind: 'internal' }
  | { kind: 'hdmi' }
  | { kind: 'displayport'; index: number }
  | { kind: 'docked-displayport'; index: number }
  | { kind: 'unknown'; raw: string };

export type RoleKind = Role['kind'];

export type Rotation = 'normal' | 'left' | 'right' | 'inverted';

export interface Geometry {
  width: number;
  height: number;
  x: number;
  y: number;
}

export interface Output {
  readonly name: string;                   // identity as reported by xrandr, e.g. "DP-1-2"
  readonly role: Role;
  readonly connected: boolean;
  readonly primary: boolean;
  readonly model?: string;                 // EDID display product name
  readonly geometry?: Geometry;            // absent while the output is disabled
  readonly rotation?: Rotation;
}

// ---------------------------------------------------------------------------
// Layout operations
// ---------------------------------------------------------------------------

export type Relation = 'left-of' | 'above' | 'right-of' | 'same-as';

/** Mode directive of a preset: let xrandr pick, or force a resolution. */
export type ModeDirective =
  | { kind: 'auto' }
  | { kind: 'mode'; resolution: string };

export type Directive =
  | { kind: 'relation'; relation: Relation; reference: string }
  | { kind: 'auto' }
  | { kind: 'mode'; resolution: string }
  | { kind: 'off' }
  | { kind: 'rotate'; rotation: Rotation };

export interface LayoutOperation {
  output: string;
  directives: Directive[];
}

/** Ordered; later operations may reference outputs placed by earlier ones. */
export type LayoutBatch = LayoutOperation[];

export interface Preset {
  readonly label: string;
  readonly relation: Relation;
  readonly mode: ModeDirective;
}

export type Scenario = 'internal' | 'home' | 'presentation' | 'single-external';

export type Resolution =
  | { kind: 'apply'; scenario: Scenario; batch: LayoutBatch; presentation: boolean; preset?: Preset }
  | { kind: 'unchanged' };

// ---------------------------------------------------------------------------
// Cycle outcomes
// ---------------------------------------------------------------------------

export type CycleOutcome =
  | { status: 'applied'; selection: string; scenario: Scenario; warning?: string; mismatches?: string[] }
  | { status: 'cancelled' }
  | { status: 'failed'; code: string; message: string };

// ---------------------------------------------------------------------------
// Hotplug
// ---------------------------------------------------------------------------

export interface HotplugEvent {
  action: string;                          // "change", "add", "remove"
  devpath: string;
  subsystem: string;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface CommandNames {
  xrandr: string;
  picker: string;
  notify: string;
  dunstctl: string;
  xset: string;
  herbstclient: string;
  panel: string;
  udevadm: string;
}

export interface Timeouts {
  queryMs: number;
  applyMs: number;
  pickerMs: number;
  effectMs: number;
  killGraceMs: number;                     // SIGTERM → SIGKILL escalation delay
}

export interface AppConfig {
  logLevel: LogLevel;
  runtimeDir: string;                      // where the session marker lives
  pidFileName: string;
  presentMode: string;                     // resolution for "home-present"
  wallpaperScript: string;
  commands: CommandNames;
  picker: { extraArgs: string[] };
  timeouts: Timeouts;
  hotplug: { restartDelayMs: number };
}
