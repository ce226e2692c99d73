import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { vi } from 'vitest';
import type { SupervisedProcess } from '../jobExecutor.js';

/**
 * In-process stand-in for an ffmpeg child process
 */
export class FakeProcess extends EventEmitter implements SupervisedProcess {
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  readonly kill = vi.fn((signal?: NodeJS.Signals | number): boolean => {
    if (this.exitCode === null) {
      setImmediate(() => this.close(null, typeof signal === 'string' ? signal : 'SIGTERM'));
    }
    return true;
  });

  /**
   * Write stderr lines, then exit with the given code
   */
  finish(code: number, lines: string[] = []): void {
    for (const line of lines) {
      this.stderr.write(`${line}\n`);
    }
    this.close(code, null);
  }

  fail(error: Error): void {
    this.stderr.end();
    this.emit('error', error);
  }

  private close(code: number | null, signal: NodeJS.Signals | null): void {
    if (!this.stderr.writableEnded) this.stderr.end();
    this.exitCode = code ?? 143;
    this.emit('close', code, signal);
  }
}

/**
 * Spawner whose processes finish on the next tick using `behave`
 */
export function fakeSpawner(behave: (args: string[], child: FakeProcess) => void) {
  const children: FakeProcess[] = [];
  const spawnProcess = vi.fn((_command: string, args: string[]): SupervisedProcess => {
    const child = new FakeProcess();
    children.push(child);
    setImmediate(() => behave(args, child));
    return child;
  });
  return { spawnProcess, children };
}
