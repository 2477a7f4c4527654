/**
 * display/presets.ts
 *
 * Named placements offered in the second picker prompt. The table is
 * frozen at load; labels are unique.
 */

import { Preset } from '../core/types';

export const FULL_HD = '1920x1080';

export const PRESETS: readonly Preset[] = Object.freeze([
  { label: 'left',        relation: 'left-of',  mode: { kind: 'auto' } },
  { label: 'above',       relation: 'above',    mode: { kind: 'auto' } },
  { label: 'left fullhd', relation: 'left-of',  mode: { kind: 'mode', resolution: FULL_HD } },
  { label: 'right',       relation: 'right-of', mode: { kind: 'auto' } },
  { label: 'same',        relation: 'same-as',  mode: { kind: 'auto' } }
] satisfies Preset[]);

const PRESETS_BY_LABEL = new Map(PRESETS.map(p => [p.label, p] as const));

export function presetLabels(): string[] {
  return PRESETS.map(p => p.label);
}

export function findPreset(label: string): Preset | undefined {
  return PRESETS_BY_LABEL.get(label);
}
