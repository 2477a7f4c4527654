/**
 * app/wiring.ts
 *
 * Builds the object graph for one process from its config. Everything
 * that touches the system is created here and nowhere else.
 */

import { AppConfig } from '../core/types';
import { markerPath } from '../core/config';
import { ChildProcessRunner, CommandRunner } from '../core/exec';
import { OutputInventory } from '../display/inventory';
import { TopologyResolver } from '../display/resolver';
import { CommandSynthesizer } from '../display/synthesizer';
import { PickerPresetChooser, SessionCoordinator } from '../session/coordinator';
import { PidFileStore } from '../session/store';
import { ProcfsProcessTable } from '../session/process_table';
import { DesktopSideEffects } from '../effects/side_effects';
import { UdevadmEventSource } from '../hotplug/event_source';
import { CycleWorker } from '../hotplug/worker';
import { HotplugListener } from '../hotplug/listener';
import { ApplyCycle } from './cycle';

export interface App {
  cycle: ApplyCycle;
  coordinator: SessionCoordinator;
  /** Listener over udevadm whose interactive cycles run on a worker. */
  createListener(): HotplugListener;
}

export function buildApp(config: AppConfig, runner: CommandRunner = new ChildProcessRunner(config.timeouts.killGraceMs)): App {
  const inventory = new OutputInventory(runner, config);
  const coordinator = new SessionCoordinator(
    runner,
    new PidFileStore(markerPath(config)),
    new ProcfsProcessTable(),
    config
  );
  const resolver = new TopologyResolver(new PickerPresetChooser(coordinator), config);
  const synthesizer = new CommandSynthesizer(runner, config);
  const desktop = new DesktopSideEffects(runner, config);

  const cycle = new ApplyCycle({
    inventory,
    coordinator,
    resolver,
    synthesizer,
    effects: desktop,
    notifier: desktop
  });

  return {
    cycle,
    coordinator,
    createListener: () => new HotplugListener(
      {
        source: new UdevadmEventSource(config),
        inventory,
        coordinator,
        cycle,
        worker: new CycleWorker(signal => cycle.runInteractive(signal)),
        notifier: desktop
      },
      config.hotplug
    )
  };
}
