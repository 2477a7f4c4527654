/**
 * app/cycle.ts
 *
 * One apply cycle, top to bottom:
 *   1. query the inventory
 *   2. ask which layout (picker)
 *   3. resolve it into a batch (may ask for a preset)
 *   4. apply the batch, then run the desktop side effects
 *   5. read the layout back and report what differs
 *
 * Every failure stops the cycle here: it is logged, turned into a
 * notification and reported as a `failed` outcome. Cancellation is
 * silent.
 */

import { CycleOutcome, Output, Resolution } from '../core/types';
import { ScreenswitchError, describeError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { OutputInventory } from '../display/inventory';
import { TopologyResolver, SELECTIONS } from '../display/resolver';
import { CommandSynthesizer } from '../display/synthesizer';
import { placementOf } from '../display/geometry';
import { INTERNAL_OUTPUT, onlyInternal, prettyName } from '../display/roles';
import { SessionCoordinator } from '../session/coordinator';
import { Notifier, SideEffects } from '../effects/side_effects';

const log = scopedLogger('app/cycle');

/** Blank entry rendered between the built-in layouts and the outputs. */
const MENU_SEPARATOR = '';

export interface CycleDeps {
  inventory: Pick<OutputInventory, 'listConnectedOutputs'>;
  coordinator: Pick<SessionCoordinator, 'prompt'>;
  resolver: Pick<TopologyResolver, 'resolve'>;
  synthesizer: Pick<CommandSynthesizer, 'apply'>;
  effects: SideEffects;
  notifier: Notifier;
}

function aborted(step: string): CycleOutcome {
  log.info({ step }, 'Cycle superseded by a newer request');
  return { status: 'cancelled' };
}

/** First-stage picker entries for the given inventory. */
export function menuOptions(outputs: readonly Output[]): string[] {
  const options: string[] = [SELECTIONS.internal];
  if (!onlyInternal(outputs)) {
    options.push(SELECTIONS.home, SELECTIONS.homePresent, SELECTIONS.present, MENU_SEPARATOR);
  }
  for (const output of outputs) {
    if (output.role.kind === 'internal') continue;
    options.push(prettyName(output));
  }
  return options;
}

export class ApplyCycle {
  constructor(private readonly deps: CycleDeps) {}

  /**
   * Full interactive flow. Never throws. Once `signal` fires the cycle
   * stops at its next step and ends as cancelled; an open picker is
   * terminated.
   */
  async runInteractive(signal?: AbortSignal): Promise<CycleOutcome> {
    return this.guard(async () => {
      const outputs = await this.deps.inventory.listConnectedOutputs();
      if (signal?.aborted) return aborted('query');

      const selection = await this.deps.coordinator.prompt(menuOptions(outputs), 'screen', signal);
      if (selection === null || selection === MENU_SEPARATOR) {
        log.info('Selection cancelled');
        return { status: 'cancelled' };
      }
      return this.applySelection(selection, outputs, signal);
    });
  }

  /** Applies a known selection without the first prompt. Never throws. */
  async runSelection(selection: string, outputs: readonly Output[]): Promise<CycleOutcome> {
    return this.guard(() => this.applySelection(selection, outputs));
  }

  private async applySelection(selection: string, outputs: readonly Output[], signal?: AbortSignal): Promise<CycleOutcome> {
    log.info({ selection, outputs: outputs.map(o => o.name) }, 'Applying selection');

    const resolution = await this.deps.resolver.resolve(selection, outputs, signal);
    if (resolution.kind === 'unchanged') {
      log.info({ selection }, 'Preset prompt cancelled, layout unchanged');
      return { status: 'cancelled' };
    }
    if (signal?.aborted) return aborted('apply');

    const applied = await this.deps.synthesizer.apply(resolution.batch);
    if (applied.warning) {
      await this.deps.notifier.notify(applied.warning, 'warning');
    }

    const failedEffects = await this.deps.effects.afterApply(resolution.presentation);
    if (failedEffects.length > 0) {
      log.warn({ failedEffects }, 'Layout applied, some side effects failed');
    }

    const mismatches = applied.invoked ? await this.verifyLayout(resolution) : [];

    return {
      status: 'applied',
      selection,
      scenario: resolution.scenario,
      warning: applied.warning,
      mismatches: mismatches.length > 0 ? mismatches : undefined
    };
  }

  /**
   * Re-reads the layout and lists where xrandr placed or rotated an
   * output differently than requested. Outputs that are missing or off
   * in the read-back are not compared.
   */
  private async verifyLayout(resolution: Extract<Resolution, { kind: 'apply' }>): Promise<string[]> {
    const preset = resolution.preset;
    const rotations = resolution.batch.flatMap(op =>
      op.directives.flatMap(d => (d.kind === 'rotate' ? [{ output: op.output, rotation: d.rotation }] : []))
    );
    if (!preset && rotations.length === 0) return [];

    let outputs: Output[];
    try {
      outputs = await this.deps.inventory.listConnectedOutputs();
    } catch (e) {
      log.warn({ error: describeError(e) }, 'Could not verify layout');
      return [];
    }

    const mismatches: string[] = [];
    if (preset && resolution.batch.length > 0) {
      const subject = resolution.batch[0].output;
      const placement = placementOf(outputs, subject, INTERNAL_OUTPUT);
      if (placement !== undefined && placement !== preset.relation) {
        mismatches.push(`${subject} is ${placement} ${INTERNAL_OUTPUT}, expected ${preset.relation}`);
      }
    }
    for (const expected of rotations) {
      const actual = outputs.find(o => o.name === expected.output)?.rotation;
      if (actual !== undefined && actual !== expected.rotation) {
        mismatches.push(`${expected.output} is rotated ${actual}, expected ${expected.rotation}`);
      }
    }

    if (mismatches.length > 0) {
      log.warn({ mismatches, primary: outputs.find(o => o.primary)?.name }, 'Layout differs from the request');
    }
    return mismatches;
  }

  private async guard(run: () => Promise<CycleOutcome>): Promise<CycleOutcome> {
    try {
      return await run();
    } catch (e) {
      const code = e instanceof ScreenswitchError ? e.code : 'INTERNAL_ERROR';
      const message = describeError(e);
      log.error({ code, error: message, details: e instanceof ScreenswitchError ? e.details : undefined }, 'Cycle failed');
      await this.deps.notifier.notify(message, 'error');
      return { status: 'failed', code, message };
    }
  }
}
