import { ChildProcess } from 'child_process';
import { PassThrough } from 'stream';

/**
 * Child process double for tests that mock `child_process.spawn`.
 * Nothing is executed; the test drives the lifecycle events.
 */
export class FakeChild extends ChildProcess {
  readonly pid = 4321;
  readonly out = new PassThrough();
  readonly err = new PassThrough();
  readonly in = new PassThrough();
  readonly signals: Array<NodeJS.Signals | number | undefined> = [];
  unrefed = false;
  input = '';

  constructor() {
    super();
    this.stdout = this.out;
    this.stderr = this.err;
    this.stdin = this.in;
    this.in.setEncoding('utf-8');
    this.in.on('data', (chunk: string) => {
      this.input += chunk;
    });
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    return true;
  }

  unref(): void {
    this.unrefed = true;
  }

  spawned(): void {
    this.emit('spawn');
  }

  close(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.emit('close', code, signal);
  }
}

export const flush = () => new Promise<void>(resolve => setImmediate(resolve));
