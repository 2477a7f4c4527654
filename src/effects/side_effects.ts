/**
 * effects/side_effects.ts
 *
 * Desktop housekeeping that follows a successful apply, plus user
 * notifications. Every call here is best effort: a failing step is
 * logged and the remaining steps still run.
 *
 *   herbstclient detect_monitors / emit_hook quit_panel
 *   barpyrus <monitor> per herbstclient monitor (detached)
 *   ~/.fehbg                                  (if present)
 *   dunstctl set-paused, xset s               (presentation mode)
 */

import * as fs from 'fs';
import { AppConfig } from '../core/types';
import { CommandResult, CommandRunner, describeFailure, formatCommand } from '../core/exec';
import { CommandError, describeError, errnoCode } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('effects/side_effects');

export type NotificationKind = 'error' | 'warning';

const NOTIFICATION_TITLES: Record<NotificationKind, string> = {
  error: 'Screen Configuration Error',
  warning: 'Screen Configuration Warning'
};

export interface Notifier {
  notify(message: string, kind?: NotificationKind): Promise<void>;
}

export interface SideEffects {
  /** Runs every post-apply step; resolves with the names of the steps that failed. */
  afterApply(presentation: boolean): Promise<string[]>;
}

export class DesktopSideEffects implements SideEffects, Notifier {
  constructor(
    private readonly runner: CommandRunner,
    private readonly config: Pick<AppConfig, 'commands' | 'timeouts' | 'wallpaperScript'>
  ) {}

  async notify(message: string, kind: NotificationKind = 'error'): Promise<void> {
    const urgency = kind === 'error' ? 'critical' : 'normal';
    try {
      await this.exec(this.config.commands.notify, ['-u', urgency, NOTIFICATION_TITLES[kind], message]);
    } catch (e) {
      log.error({ message, error: describeError(e) }, 'Could not deliver notification');
    }
  }

  async afterApply(presentation: boolean): Promise<string[]> {
    const failed: string[] = [];
    const attempt = async (step: string, fn: () => Promise<void>) => {
      try {
        await fn();
      } catch (e) {
        failed.push(step);
        log.warn({ step, error: describeError(e) }, 'Side effect failed');
      }
    };

    await attempt('window-manager', () => this.updateWindowManager());
    await attempt('wallpaper', () => this.restoreWallpaper());
    await attempt('presentation-mode', () => this.setPresentationMode(presentation));
    return failed;
  }

  async updateWindowManager(): Promise<void> {
    const hc = this.config.commands.herbstclient;
    await this.exec(hc, ['detect_monitors']);
    await this.exec(hc, ['emit_hook', 'quit_panel']);

    const monitors = (await this.exec(hc, ['list_monitors'])).stdout
      .split('\n')
      .filter(line => line.trim());
    for (const monitor of monitors) {
      const monitorId = monitor.split(':')[0];
      this.runner.launchDetached(this.config.commands.panel, [monitorId]);
    }
    log.debug({ panels: monitors.length }, 'Panels restarted');
  }

  async restoreWallpaper(): Promise<void> {
    const script = this.config.wallpaperScript;
    try {
      const stat = await fs.promises.stat(script);
      if (!stat.isFile()) return;
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') {
        log.debug({ script }, 'No wallpaper script');
        return;
      }
      throw e;
    }
    await this.exec(script, []);
  }

  async setPresentationMode(present: boolean): Promise<void> {
    await this.exec(this.config.commands.dunstctl, ['set-paused', present ? 'true' : 'false']);
    await this.exec(this.config.commands.xset, ['s', present ? 'off' : 'default']);
    log.info({ present }, 'Presentation mode set');
  }

  private async exec(command: string, args: string[]): Promise<CommandResult> {
    const result = await this.runner.run(command, args, { timeoutMs: this.config.timeouts.effectMs });
    if (result.exitCode !== 0) {
      throw new CommandError(command, `${formatCommand(command, args)} failed: ${describeFailure(result)}`, {
        exitCode: result.exitCode
      });
    }
    return result;
  }
}
