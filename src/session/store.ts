/**
 * session/store.ts
 *
 * Where the pid of the live picker is recorded. The coordinator only
 * sees the SessionStore interface; production uses a pid file in the
 * runtime directory, shared by every screenswitch process of the user.
 *
 * No locking: writers follow terminate-then-write and the last writer
 * wins. Two launches racing through the stale check can both claim.
 */

import * as fs from 'fs';
import { errnoCode } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('session/store');

export interface SessionStore {
  /** Pid recorded by the current marker, if any. */
  currentHolder(): Promise<number | undefined>;
  claim(pid: number): Promise<void>;
  /**
   * Removes the marker. With `pid`, only while the marker still names
   * that pid, so a superseded owner does not delete its successor's.
   */
  release(pid?: number): Promise<void>;
}

export class PidFileStore implements SessionStore {
  constructor(private readonly filePath: string) {}

  async currentHolder(): Promise<number | undefined> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return undefined;
      throw e;
    }

    const pid = Number(raw.trim());
    if (!Number.isInteger(pid) || pid <= 0) {
      log.warn({ path: this.filePath, content: raw.trim() }, 'Ignoring malformed pid file');
      return undefined;
    }
    return pid;
  }

  async claim(pid: number): Promise<void> {
    await fs.promises.writeFile(this.filePath, String(pid), 'utf-8');
    log.debug({ path: this.filePath, pid }, 'Marker written');
  }

  async release(pid?: number): Promise<void> {
    if (pid !== undefined) {
      const holder = await this.currentHolder();
      if (holder !== undefined && holder !== pid) {
        log.debug({ pid, holder }, 'Marker belongs to another session, leaving it');
        return;
      }
    }

    try {
      await fs.promises.unlink(this.filePath);
      log.debug({ path: this.filePath }, 'Marker removed');
    } catch (e) {
      if (errnoCode(e) !== 'ENOENT') throw e;
    }
  }
}
