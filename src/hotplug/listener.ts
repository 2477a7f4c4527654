/**
 * hotplug/listener.ts
 *
 * Long-lived loop over DRM hotplug events. On every event:
 *   - only the internal panel left (undocked): kill any open picker,
 *     abort the background cycle and switch to the internal layout right
 *     away, no questions asked;
 *   - anything else: kill any open picker and hand a fresh interactive
 *     cycle to the worker, which aborts the one still running.
 *
 * Failures are logged and notified; the loop keeps going. If the event
 * source dies it is re-subscribed after a delay.
 */

import { HotplugEvent } from '../core/types';
import { describeError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { OutputInventory } from '../display/inventory';
import { SELECTIONS } from '../display/resolver';
import { onlyInternal } from '../display/roles';
import { SessionCoordinator } from '../session/coordinator';
import { ApplyCycle } from '../app/cycle';
import { Notifier } from '../effects/side_effects';
import { HotplugEventSource } from './event_source';
import { CycleWorker } from './worker';

const log = scopedLogger('hotplug/listener');

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface ListenerDeps {
  source: HotplugEventSource;
  inventory: Pick<OutputInventory, 'listConnectedOutputs'>;
  coordinator: Pick<SessionCoordinator, 'supersede'>;
  cycle: Pick<ApplyCycle, 'runSelection'>;
  worker: Pick<CycleWorker, 'request' | 'cancel'>;
  notifier: Notifier;
}

export type HotplugAction = 'internal-applied' | 'cycle-requested' | 'failed';

export class HotplugListener {
  private stopped = false;

  constructor(
    private readonly deps: ListenerDeps,
    private readonly options: { restartDelayMs: number }
  ) {}

  /** Returns only after stop(). */
  async run(): Promise<void> {
    while (!this.stopped) {
      try {
        for await (const event of this.deps.source.events()) {
          if (this.stopped) break;
          await this.handle(event);
        }
      } catch (e) {
        log.error({ error: describeError(e) }, 'Hotplug subscription failed');
      }

      if (this.stopped) break;
      log.warn({ delayMs: this.options.restartDelayMs }, 'Hotplug subscription ended, re-subscribing');
      await sleep(this.options.restartDelayMs);
    }
    log.info('Hotplug listener stopped');
  }

  stop(): void {
    this.stopped = true;
  }

  async handle(event: HotplugEvent): Promise<HotplugAction> {
    try {
      const outputs = await this.deps.inventory.listConnectedOutputs();
      log.info({ action: event.action, devpath: event.devpath, outputs: outputs.map(o => o.name) }, 'Detected change');

      await this.deps.coordinator.supersede();

      if (onlyInternal(outputs)) {
        this.deps.worker.cancel();
        const outcome = await this.deps.cycle.runSelection(SELECTIONS.internal, outputs);
        return outcome.status === 'failed' ? 'failed' : 'internal-applied';
      }

      this.deps.worker.request();
      return 'cycle-requested';
    } catch (e) {
      const message = describeError(e);
      log.error({ error: message }, 'Could not handle hotplug event');
      await this.deps.notifier.notify(message, 'error');
      return 'failed';
    }
  }
}
