/**
 * hotplug/event_source.ts
 *
 * DRM change notifications from `udevadm monitor`. Each kernel uevent
 * arrives as one line:
 *
 *   KERNEL[12693.491512] change   /devices/pci0000:00/0000:00:02.0/drm/card0 (drm)
 *
 * Header lines and blank lines are skipped.
 */

import { spawn } from 'child_process';
import * as readline from 'readline';
import { AppConfig, HotplugEvent } from '../core/types';
import { CommandError } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('hotplug/event_source');

const UEVENT_RE = /^(?:KERNEL|UDEV)\s*\[[\d.]+\]\s+(\S+)\s+(\S+)\s+\(([^)]+)\)\s*$/;

export interface HotplugEventSource {
  /** Ends only when the underlying subscription dies. */
  events(): AsyncIterable<HotplugEvent>;
}

export function parseUeventLine(line: string): HotplugEvent | null {
  const match = UEVENT_RE.exec(line.trim());
  if (!match) return null;
  const [, action, devpath, subsystem] = match;
  return { action, devpath, subsystem };
}

export class UdevadmEventSource implements HotplugEventSource {
  constructor(private readonly config: Pick<AppConfig, 'commands'>) {}

  async *events(): AsyncGenerator<HotplugEvent> {
    const command = this.config.commands.udevadm;
    const child = spawn(command, ['monitor', '--kernel', '--subsystem-match=drm'], {
      stdio: ['ignore', 'pipe', 'pipe']
    });

    const spawnState: { failure?: Error } = {};
    child.on('error', (e) => { spawnState.failure = e; });
    child.stderr.setEncoding('utf-8');
    child.stderr.on('data', (chunk: string) => log.debug({ stderr: chunk.trim() }, 'udevadm stderr'));

    const lines = readline.createInterface({ input: child.stdout, terminal: false });
    log.info({ pid: child.pid }, 'Subscribed to drm uevents');

    try {
      for await (const line of lines) {
        const event = parseUeventLine(line);
        if (event && event.subsystem === 'drm') yield event;
      }
    } finally {
      lines.close();
      if (child.exitCode === null && child.signalCode === null) child.kill('SIGTERM');
    }

    if (spawnState.failure) {
      throw new CommandError(command, `Cannot monitor hotplug events: ${spawnState.failure.message}`);
    }
  }
}
