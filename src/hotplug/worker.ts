/**
 * hotplug/worker.ts
 *
 * Runs interactive cycles for the listener, one at a time, so the
 * listener loop never blocks on a picker. Requests coalesce: any number
 * of requests made while a cycle is running yield a single follow-up run.
 *
 * A request also aborts the running cycle's signal. The cycle stops at
 * its next step (a picker on screen is terminated), ends as cancelled,
 * and the follow-up starts on a fresh inventory.
 */

import { CycleOutcome } from '../core/types';
import { describeError } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('hotplug/worker');

export type CycleJob = (signal: AbortSignal) => Promise<CycleOutcome>;

export class CycleWorker {
  private pending = false;
  private draining: Promise<void> | null = null;
  private current: AbortController | null = null;

  constructor(private readonly job: CycleJob) {}

  get busy(): boolean {
    return this.draining !== null;
  }

  request(): void {
    this.pending = true;
    if (this.draining) {
      log.debug('Cycle running, follow-up queued');
      this.abortCurrent();
      return;
    }
    this.draining = this.drain().finally(() => {
      this.draining = null;
    });
  }

  /** Aborts the running cycle, if any, and drops a queued follow-up. */
  cancel(): void {
    this.pending = false;
    this.abortCurrent();
  }

  /** Resolves once nothing is running or queued. */
  async whenIdle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private abortCurrent(): void {
    if (!this.current || this.current.signal.aborted) return;
    log.info('Aborting running cycle');
    this.current.abort();
  }

  private async drain(): Promise<void> {
    while (this.pending) {
      this.pending = false;
      const controller = new AbortController();
      this.current = controller;
      try {
        const outcome = await this.job(controller.signal);
        log.info({ outcome }, 'Background cycle finished');
      } catch (e) {
        log.error({ error: describeError(e) }, 'Background cycle crashed');
      } finally {
        this.current = null;
      }
    }
  }
}
