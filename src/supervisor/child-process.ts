import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import { Readable } from 'stream';

/**
 * The slice of `ChildProcess` the supervisor depends on.
 */
export interface SupervisedChild extends EventEmitter {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export interface ProcessSpawner {
  spawn(command: string, args: string[]): SupervisedChild;
}

export const defaultSpawner: ProcessSpawner = {
  spawn(command: string, args: string[]): SupervisedChild {
    return spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });
  },
};

export class StopTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Process did not exit within ${timeoutMs}ms`);
    this.name = 'StopTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function hasExited(child: SupervisedChild): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

export function describeExit(child: SupervisedChild): string {
  if (child.exitCode !== null) {
    return `process exited with code ${child.exitCode}`;
  }

  return `process exited with signal ${child.signalCode ?? 'unknown'}`;
}

/**
 * Resolves once the OS has accepted the spawn, rejects with the spawn error
 * (ENOENT for a missing binary, EACCES for a non-executable one).
 */
export function waitForSpawn(child: SupervisedChild): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = (): void => {
      child.removeListener('error', onError);
      resolve();
    };

    const onError = (error: Error): void => {
      child.removeListener('spawn', onSpawn);
      reject(error);
    };

    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

/**
 * Waits for the child to exit. Without `timeoutMs` the wait is unbounded;
 * with it, rejects with StopTimeoutError once the bound passes.
 */
export function waitForExit(child: SupervisedChild, timeoutMs?: number): Promise<void> {
  if (hasExited(child)) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    let timeoutId: NodeJS.Timeout | undefined;

    const onExit = (): void => {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      resolve();
    };

    child.once('exit', onExit);

    if (timeoutMs !== undefined) {
      timeoutId = setTimeout(() => {
        child.removeListener('exit', onExit);
        reject(new StopTimeoutError(timeoutMs));
      }, timeoutMs);
    }
  });
}
