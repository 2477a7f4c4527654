/**
 * session/process_table.ts
 *
 * Liveness and identity checks for the pid named by a session marker.
 * Linux only: the program name is argv[0] from /proc/<pid>/cmdline.
 */

import * as fs from 'fs';
import * as path from 'path';
import { errnoCode } from '../core/errors';

export interface ProcessInfo {
  alive: boolean;
  program?: string;                        // basename of argv[0]; absent for kernel threads and zombies
}

export interface ProcessTable {
  inspect(pid: number): Promise<ProcessInfo>;
  /** False when the process no longer exists. */
  signal(pid: number, signal: NodeJS.Signals): boolean;
}

export class ProcfsProcessTable implements ProcessTable {
  constructor(private readonly procRoot = '/proc') {}

  async inspect(pid: number): Promise<ProcessInfo> {
    let cmdline: string;
    try {
      cmdline = await fs.promises.readFile(path.join(this.procRoot, String(pid), 'cmdline'), 'utf-8');
    } catch (e) {
      const code = errnoCode(e);
      if (code === 'ENOENT' || code === 'ESRCH') return { alive: false };
      throw e;
    }

    const argv0 = cmdline.split('\0')[0];
    return argv0 ? { alive: true, program: path.basename(argv0) } : { alive: true };
  }

  signal(pid: number, signal: NodeJS.Signals): boolean {
    try {
      process.kill(pid, signal);
      return true;
    } catch (e) {
      if (errnoCode(e) === 'ESRCH') return false;
      throw e;
    }
  }
}
