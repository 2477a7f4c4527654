/**
 * display/resolver.ts
 *
 * Turns a picker selection plus the live inventory into an ordered
 * LayoutBatch. Four scenarios:
 *
 *   internal       every connected output except the internal panel off
 *   home           [vertical docked DP] - [DP-2] - [internal], fixed rig
 *   home-present   same, DP-2 forced to the presentation resolution
 *   present        [projector] == [mirror target] - [internal]
 *   anything else  one external output placed by a preset
 *
 * The internal panel is the anchor everything is placed against; only
 * the home layout touches it (to re-enable it last).
 */

import {
  AppConfig,
  Directive,
  LayoutBatch,
  LayoutOperation,
  Output,
  Preset,
  Resolution
} from '../core/types';
import { TopologyAmbiguousError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { INTERNAL_OUTPUT, KNOWN_OUTPUTS, hasRole, isDisplayPort, resolveKnownIdentity } from './roles';

const log = scopedLogger('display/resolver');

export const SELECTIONS = {
  internal: 'internal',
  home: 'home',
  homePresent: 'home-present',
  present: 'present'
} as const;

/** Asks the user for a preset; null when they back out or `signal` fires. */
export interface PresetChooser {
  choosePreset(signal?: AbortSignal): Promise<Preset | null>;
}

export interface PresentationAssignment {
  projector: string;
  mirrorTarget: string;
}

// ---------------------------------------------------------------------------
// Batch builders
// ---------------------------------------------------------------------------

export function internalOnlyBatch(outputs: readonly Output[]): LayoutBatch {
  return outputs
    .filter(o => o.role.kind !== 'internal')
    .map((o): LayoutOperation => ({ output: o.name, directives: [{ kind: 'off' }] }));
}

export function homeBatch(present: boolean, presentMode: string): LayoutBatch {
  const middleMode: Directive = present ? { kind: 'mode', resolution: presentMode } : { kind: 'auto' };
  return [
    {
      output: KNOWN_OUTPUTS.dp2,
      directives: [{ kind: 'relation', relation: 'left-of', reference: INTERNAL_OUTPUT }, middleMode]
    },
    {
      output: KNOWN_OUTPUTS.dp_dock_2,
      directives: [
        { kind: 'relation', relation: 'left-of', reference: KNOWN_OUTPUTS.dp2 },
        { kind: 'auto' },
        { kind: 'rotate', rotation: 'right' }
      ]
    },
    { output: INTERNAL_OUTPUT, directives: [{ kind: 'auto' }] }
  ];
}

/** Relation to `reference` followed by the preset's mode directive. */
export function placementDirectives(preset: Preset, reference: string): Directive[] {
  const mode: Directive = preset.mode.kind === 'auto'
    ? { kind: 'auto' }
    : { kind: 'mode', resolution: preset.mode.resolution };
  return [{ kind: 'relation', relation: preset.relation, reference }, mode];
}

function hyphenCount(name: string): number {
  return name.split('-').length - 1;
}

/**
 * Picks projector and mirror target among the connected outputs.
 *
 * One DP output plus HDMI: HDMI drives the projector. Two DP outputs and
 * no HDMI: the docked one (more hyphens, e.g. DP-1-1) is taken as the
 * projector and the plain one (DP-2) as the mirror target, ties broken
 * by identity so the result never depends on report order.
 */
export function assignPresentation(outputs: readonly Output[]): PresentationAssignment {
  const dpOutputs = outputs.filter(isDisplayPort);
  const withHdmi = hasRole(outputs, 'hdmi');
  const names = outputs.map(o => o.name);

  if (dpOutputs.length === 1 && withHdmi) {
    return { projector: KNOWN_OUTPUTS.hdmi, mirrorTarget: dpOutputs[0].name };
  }

  if (dpOutputs.length === 2 && !withHdmi) {
    const [projector, mirrorTarget] = [...dpOutputs].sort((a, b) =>
      hyphenCount(b.name) - hyphenCount(a.name) || a.name.localeCompare(b.name)
    );
    return { projector: projector.name, mirrorTarget: mirrorTarget.name };
  }

  if (dpOutputs.length === 0) {
    throw new TopologyAmbiguousError('No DisplayPort outputs found', names);
  }
  throw new TopologyAmbiguousError('Cannot tell projector from mirror target', names);
}

export function presentationBatch(assignment: PresentationAssignment, preset: Preset): LayoutBatch {
  return [
    { output: assignment.mirrorTarget, directives: placementDirectives(preset, INTERNAL_OUTPUT) },
    {
      output: assignment.projector,
      directives: [{ kind: 'relation', relation: 'same-as', reference: assignment.mirrorTarget }, { kind: 'auto' }]
    }
  ];
}

export function singleExternalBatch(identity: string, preset: Preset): LayoutBatch {
  return [{ output: identity, directives: placementDirectives(preset, INTERNAL_OUTPUT) }];
}

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

export class TopologyResolver {
  constructor(
    private readonly chooser: PresetChooser,
    private readonly config: Pick<AppConfig, 'presentMode'>
  ) {}

  /**
   * Throws TopologyAmbiguousError for presentation on an unsupported
   * inventory, before any prompt is shown.
   */
  async resolve(selection: string, outputs: readonly Output[], signal?: AbortSignal): Promise<Resolution> {
    switch (selection) {
      case SELECTIONS.internal:
        return { kind: 'apply', scenario: 'internal', batch: internalOnlyBatch(outputs), presentation: false };

      case SELECTIONS.home:
      case SELECTIONS.homePresent: {
        const present = selection === SELECTIONS.homePresent;
        return { kind: 'apply', scenario: 'home', batch: homeBatch(present, this.config.presentMode), presentation: present };
      }

      case SELECTIONS.present: {
        const assignment = assignPresentation(outputs);
        log.info({ ...assignment }, 'Presentation outputs assigned');

        const preset = await this.chooser.choosePreset(signal);
        if (!preset) return { kind: 'unchanged' };
        return {
          kind: 'apply',
          scenario: 'presentation',
          batch: presentationBatch(assignment, preset),
          presentation: true,
          preset
        };
      }

      default: {
        const identity = resolveKnownIdentity(selection);
        const preset = await this.chooser.choosePreset(signal);
        if (!preset) return { kind: 'unchanged' };
        return {
          kind: 'apply',
          scenario: 'single-external',
          batch: singleExternalBatch(identity, preset),
          presentation: false,
          preset
        };
      }
    }
  }
}
