/**
 * display/roles.ts
 *
 * Closed table of well-known output identities on the docking rig, and
 * the classification of any identity into a Role. Classification is a
 * pure function of the identity string.
 */

import { Output, Role, RoleKind } from '../core/types';

/** Picker-facing key → identity reported by xrandr. */
export const KNOWN_OUTPUTS = {
  internal:  'eDP-1',
  hdmi:      'HDMI-1',
  dp1:       'DP-1',
  dp2:       'DP-2',
  dp3:       'DP-3',
  dp4:       'DP-4',
  dp_dock_1: 'DP-1-1',
  dp_dock_2: 'DP-1-2',
  dp_dock_3: 'DP-1-3'
} as const;

export const INTERNAL_OUTPUT = KNOWN_OUTPUTS.internal;

/** Identity prefix shared by plain and docked DisplayPort outputs. */
export const DP_PREFIX = 'DP';

const ROLE_TABLE: ReadonlyMap<string, Role> = new Map<string, Role>([
  [KNOWN_OUTPUTS.internal,  { kind: 'internal' }],
  [KNOWN_OUTPUTS.hdmi,      { kind: 'hdmi' }],
  [KNOWN_OUTPUTS.dp1,       { kind: 'displayport', index: 1 }],
  [KNOWN_OUTPUTS.dp2,       { kind: 'displayport', index: 2 }],
  [KNOWN_OUTPUTS.dp3,       { kind: 'displayport', index: 3 }],
  [KNOWN_OUTPUTS.dp4,       { kind: 'displayport', index: 4 }],
  [KNOWN_OUTPUTS.dp_dock_1, { kind: 'docked-displayport', index: 1 }],
  [KNOWN_OUTPUTS.dp_dock_2, { kind: 'docked-displayport', index: 2 }],
  [KNOWN_OUTPUTS.dp_dock_3, { kind: 'docked-displayport', index: 3 }]
]);

const KEY_BY_IDENTITY = new Map<string, string>(
  Object.entries(KNOWN_OUTPUTS).map(([key, identity]): [string, string] => [identity, key])
);

export function classifyRole(name: string): Role {
  return ROLE_TABLE.get(name) ?? { kind: 'unknown', raw: name };
}

/** Name shown in the picker: the table key for known outputs, else the identity. */
export function prettyName(output: Pick<Output, 'name'>): string {
  return KEY_BY_IDENTITY.get(output.name) ?? output.name;
}

/**
 * Maps a picker selection back to an identity: a case-insensitive match
 * against the table keys, falling back to the selection itself.
 */
export function resolveKnownIdentity(selection: string): string {
  const wanted = selection.toLowerCase();
  for (const [identity, key] of KEY_BY_IDENTITY) {
    if (key === wanted) return identity;
  }
  return selection;
}

export function isDisplayPort(output: Pick<Output, 'name'>): boolean {
  return output.name.startsWith(DP_PREFIX);
}

export function hasRole(outputs: readonly Output[], kind: RoleKind): boolean {
  return outputs.some(o => o.role.kind === kind);
}

export function onlyInternal(outputs: readonly Output[]): boolean {
  return outputs.length === 1 && outputs[0].role.kind === 'internal';
}
