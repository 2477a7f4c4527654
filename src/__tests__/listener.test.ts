import { HotplugListener, ListenerDeps } from '../hotplug/listener';
import { HotplugEventSource } from '../hotplug/event_source';
import { CycleWorker } from '../hotplug/worker';
import { ApplyCycle } from '../app/cycle';
import { OutputInventory } from '../display/inventory';
import { TopologyResolver } from '../display/resolver';
import { CommandSynthesizer } from '../display/synthesizer';
import { PickerPresetChooser, SessionCoordinator } from '../session/coordinator';
import { DesktopSideEffects } from '../effects/side_effects';
import { QueryError } from '../core/errors';
import { CommandResult } from '../core/exec';
import { CycleOutcome, HotplugEvent, Output } from '../core/types';
import {
  Deferred,
  FakeProcessTable,
  FakeRunner,
  MemorySessionStore,
  output,
  readFixture,
  testConfig
} from './helpers/fakes';

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

const drmChange: HotplugEvent = {
  action: 'change',
  devpath: '/devices/pci0000:00/0000:00:02.0/drm/card0',
  subsystem: 'drm'
};

/** Each subscription replays the next batch of events, then ends (or throws). */
class ScriptedEventSource implements HotplugEventSource {
  subscriptions = 0;

  constructor(private readonly batches: Array<HotplugEvent[] | Error>, private readonly onExhausted: () => void) {}

  async *events(): AsyncGenerator<HotplugEvent> {
    const batch = this.batches[this.subscriptions++];
    if (batch === undefined) {
      this.onExhausted();
      return;
    }
    if (batch instanceof Error) throw batch;
    yield* batch;
  }
}

function harness(initialOutputs: Output[]) {
  const calls: string[] = [];
  const outputs = initialOutputs;
  let queryFailure: Error | null = null;
  let selectionOutcome: CycleOutcome = { status: 'applied', selection: 'internal', scenario: 'internal' };

  const deps: Omit<ListenerDeps, 'source'> = {
    inventory: {
      listConnectedOutputs: async () => {
        calls.push('query');
        if (queryFailure) throw queryFailure;
        return outputs;
      }
    },
    coordinator: {
      supersede: async () => {
        calls.push('supersede');
        return false;
      }
    },
    cycle: {
      runSelection: async (selection: string) => {
        calls.push(`runSelection ${selection}`);
        return selectionOutcome;
      }
    },
    worker: {
      request: () => {
        calls.push('request');
      },
      cancel: () => {
        calls.push('cancel');
      }
    },
    notifier: {
      notify: async (message: string) => {
        calls.push(`notify ${message}`);
      }
    }
  };

  return {
    calls,
    deps,
    failQuery: (e: Error) => { queryFailure = e; },
    setSelectionOutcome: (o: CycleOutcome) => { selectionOutcome = o; }
  };
}

describe('Hotplug Listener', () => {
  describe('handle', () => {
    it('aborts the background cycle and switches straight to the internal layout when only the panel remains', async () => {
      const h = harness([output('eDP-1')]);
      const listener = new HotplugListener({ ...h.deps, source: new ScriptedEventSource([], () => undefined) }, { restartDelayMs: 0 });

      await expect(listener.handle(drmChange)).resolves.toBe('internal-applied');
      expect(h.calls).toEqual(['query', 'supersede', 'cancel', 'runSelection internal']);
    });

    it('cancels any open picker and requests a fresh cycle otherwise', async () => {
      const h = harness([output('eDP-1'), output('DP-2')]);
      const listener = new HotplugListener({ ...h.deps, source: new ScriptedEventSource([], () => undefined) }, { restartDelayMs: 0 });

      await expect(listener.handle(drmChange)).resolves.toBe('cycle-requested');
      expect(h.calls).toEqual(['query', 'supersede', 'request']);
    });

    it('reports a failed internal apply', async () => {
      const h = harness([output('eDP-1')]);
      h.setSelectionOutcome({ status: 'failed', code: 'APPLY_ERROR', message: 'Error running xrandr: boom' });
      const listener = new HotplugListener({ ...h.deps, source: new ScriptedEventSource([], () => undefined) }, { restartDelayMs: 0 });

      await expect(listener.handle(drmChange)).resolves.toBe('failed');
    });

    it('notifies a failed query and touches nothing', async () => {
      const h = harness([]);
      h.failQuery(new QueryError('Error checking connected screens: xrandr timed out'));
      const listener = new HotplugListener({ ...h.deps, source: new ScriptedEventSource([], () => undefined) }, { restartDelayMs: 0 });

      await expect(listener.handle(drmChange)).resolves.toBe('failed');
      expect(h.calls).toEqual(['query', 'notify Error checking connected screens: xrandr timed out']);
    });
  });

  describe('run', () => {
    it('handles every event and keeps going after a failure', async () => {
      const h = harness([output('eDP-1'), output('HDMI-1')]);
      let listener: HotplugListener | null = null;
      const source = new ScriptedEventSource([[drmChange, drmChange]], () => listener?.stop());
      let queries = 0;
      const inventory = {
        listConnectedOutputs: async () => {
          queries++;
          if (queries === 1) throw new QueryError('transient');
          return [output('eDP-1'), output('HDMI-1')];
        }
      };
      listener = new HotplugListener({ ...h.deps, inventory, source }, { restartDelayMs: 0 });

      await listener.run();

      expect(queries).toBe(2);
      expect(h.calls).toEqual(['notify transient', 'supersede', 'request']);
    });

    it('re-subscribes when the event source ends or fails', async () => {
      const h = harness([output('eDP-1'), output('DP-2')]);
      let listener: HotplugListener | null = null;
      const source = new ScriptedEventSource(
        [[drmChange], new Error('udevadm exited'), [drmChange]],
        () => listener?.stop()
      );
      listener = new HotplugListener({ ...h.deps, source }, { restartDelayMs: 0 });

      await listener.run();

      expect(source.subscriptions).toBe(4);
      expect(h.calls.filter(c => c === 'request')).toHaveLength(2);
    });

    it('stops without re-subscribing once stopped', async () => {
      const h = harness([output('eDP-1'), output('DP-2')]);
      let listener: HotplugListener | null = null;
      const source = new ScriptedEventSource([[drmChange]], () => undefined);
      h.deps.worker.request = () => listener?.stop();
      listener = new HotplugListener({ ...h.deps, source }, { restartDelayMs: 0 });

      await listener.run();

      expect(source.subscriptions).toBe(1);
    });
  });

  describe('with the real worker and session coordinator', () => {
    /**
     * Pickers stay on screen until signalled. The xrandr query numbered
     * `heldQuery` waits for `releaseQuery()`.
     */
    function liveStack(heldQuery = 0) {
      const events: string[] = [];
      const gate = new Deferred<void>();
      let report = readFixture('xrandr-present-left.txt');
      let queries = 0;

      const runner = new FakeRunner((command, args) => {
        if (command === 'xrandr' && args[0] === '--verbose') {
          queries++;
          const response = { stdout: report };
          return queries === heldQuery ? gate.promise.then(() => response) : response;
        }
        if (command === 'rofi') return new Deferred<Partial<CommandResult>>().promise;
        return {};
      });

      const config = testConfig();
      const store = new MemorySessionStore(events);
      const processes = new FakeProcessTable(events);
      processes.onSignal = (pid, signal) => {
        runner.signal(pid, signal);
      };
      const coordinator = new SessionCoordinator(runner, store, processes, config);
      const inventory = new OutputInventory(runner, config);
      const desktop = new DesktopSideEffects(runner, config);
      const cycle = new ApplyCycle({
        inventory,
        coordinator,
        resolver: new TopologyResolver(new PickerPresetChooser(coordinator), config),
        synthesizer: new CommandSynthesizer(runner, config),
        effects: desktop,
        notifier: desktop
      });
      const worker = new CycleWorker(signal => cycle.runInteractive(signal));
      const listener = new HotplugListener(
        { source: new ScriptedEventSource([], () => undefined), inventory, coordinator, cycle, worker, notifier: desktop },
        { restartDelayMs: 0 }
      );

      /** Registers every picker launched so far as a live rofi process. */
      const pickersOnScreen = () => {
        for (const call of runner.callsTo('rofi')) {
          processes.processes.set(call.pid, { alive: true, program: 'rofi' });
        }
        return runner.callsTo('rofi');
      };

      return {
        events,
        runner,
        store,
        coordinator,
        worker,
        listener,
        pickersOnScreen,
        releaseQuery: () => gate.resolve(),
        setReport: (fixture: string) => { report = readFixture(fixture); }
      };
    }

    it('drops a background cycle whose query was overtaken by a newer event', async () => {
      const live = liveStack(2);

      await expect(live.listener.handle(drmChange)).resolves.toBe('cycle-requested');
      await flush();
      await expect(live.listener.handle(drmChange)).resolves.toBe('cycle-requested');

      live.releaseQuery();
      await flush();

      const pickers = live.pickersOnScreen();
      expect(pickers).toHaveLength(1);
      expect(live.runner.kills).toEqual([]);
      expect(live.store.holder).toBe(pickers[0].pid);
      expect(live.coordinator.currentState).toBe('active');

      live.worker.cancel();
      await live.worker.whenIdle();
      expect(live.events).toEqual([`claim ${pickers[0].pid}`, `release ${pickers[0].pid}`]);
    });

    it('terminates the open picker and shows a fresh one for the newer event', async () => {
      const live = liveStack();

      await live.listener.handle(drmChange);
      await flush();
      const [stale] = live.pickersOnScreen();

      await live.listener.handle(drmChange);
      await flush();

      const pickers = live.pickersOnScreen();
      expect(pickers).toHaveLength(2);
      const fresh = pickers[1];
      expect(live.events).toEqual([
        `claim ${stale.pid}`,
        `signal ${stale.pid} SIGTERM`,
        `release ${stale.pid}`,
        `claim ${fresh.pid}`
      ]);
      expect(new Set(live.runner.kills.map(k => k.pid))).toEqual(new Set([stale.pid]));
      expect(live.store.holder).toBe(fresh.pid);
      expect(live.coordinator.currentState).toBe('active');

      live.worker.cancel();
      await live.worker.whenIdle();
    });

    it('closes the background picker when the machine is undocked', async () => {
      const live = liveStack();

      await live.listener.handle(drmChange);
      await flush();
      const [stale] = live.pickersOnScreen();

      live.setReport('xrandr-internal-only.txt');
      await expect(live.listener.handle(drmChange)).resolves.toBe('internal-applied');
      await live.worker.whenIdle();

      expect(live.runner.callsTo('rofi')).toHaveLength(1);
      expect(live.events).toEqual([`claim ${stale.pid}`, `signal ${stale.pid} SIGTERM`, `release ${stale.pid}`]);
      expect(live.store.holder).toBeUndefined();
      expect(live.coordinator.currentState).toBe('idle');
      expect(live.runner.callsTo('herbstclient').map(c => c.args[0])).toEqual(['detect_monitors', 'emit_hook', 'list_monitors']);
    });
  });
});
