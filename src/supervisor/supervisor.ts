/**
 * Supervisor
 * Owns the single managed llama-server slot: start, stop, output capture and
 * lazy detection of a process that exited on its own
 */

import pLimit from 'p-limit';
import {
  EndpointAddress,
  ModelCatalog,
  ModelDescriptor,
  buildLaunchCommand,
  formatLaunchCommand,
} from '../config/models';
import { getErrorMessage, getLogger, Logger } from '../utils';
import {
  ProcessSpawner,
  StopTimeoutError,
  SupervisedChild,
  defaultSpawner,
  describeExit,
  hasExited,
  waitForExit,
  waitForSpawn,
} from './child-process';
import { LogBuffer, LogLine } from './log-buffer';
import { OutputCapture } from './output-capture';

export const DEFAULT_STOP_TIMEOUT_MS = 10_000;
export const DEFAULT_CAPTURE_DRAIN_MS = 1_000;
export const NO_MODEL_RUNNING = 'No model running';

export type SupervisorState = 'idle' | 'starting' | 'running' | 'stopping';

interface ManagedProcess {
  readonly child: SupervisedChild;
  readonly pid: number;
  readonly model: ModelDescriptor;
  readonly startedAt: Date;
  readonly capture: OutputCapture;
}

// State tag and process slot travel together, so `running` without a
// process and `idle` with one cannot be represented.
type Slot =
  | { state: 'idle' }
  | { state: 'starting'; model: ModelDescriptor }
  | { state: 'running'; process: ManagedProcess }
  | { state: 'stopping'; process: ManagedProcess };

export interface ManagedProcessInfo {
  modelId: string;
  name: string;
  pid: number;
  startedAt: Date;
  endpoint: EndpointAddress;
}

export type StartFailureCode = 'UNKNOWN_MODEL' | 'LAUNCH_FAILURE';

export type StartResult =
  | { success: true; model: string; name: string; pid: number }
  | { success: false; code: StartFailureCode; error: string };

export type StopResult =
  | { success: true; message: typeof NO_MODEL_RUNNING }
  | { success: true; stopped: string; name: string }
  | { success: false; code: 'STOP_FAILED'; error: string; stopped: string; name: string };

export type ReapResult =
  | { status: 'idle' }
  | { status: 'exited'; message: string }
  | { status: 'running'; process: ManagedProcessInfo };

export interface ManagedProcessSource {
  getCurrent(): ManagedProcessInfo | null;
}

export interface SupervisorOptions {
  catalog: ModelCatalog;
  spawner?: ProcessSpawner;
  logBuffer?: LogBuffer;
  logger?: Logger;
  stopTimeoutMs?: number;
  captureDrainMs?: number;
  now?: () => Date;
}

function toInfo(managed: ManagedProcess): ManagedProcessInfo {
  return {
    modelId: managed.model.id,
    name: managed.model.name,
    pid: managed.pid,
    startedAt: managed.startedAt,
    endpoint: { ...managed.model.endpoint },
  };
}

function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }

  return undefined;
}

export class Supervisor implements ManagedProcessSource {
  private slot: Slot = { state: 'idle' };
  private readonly catalog: ModelCatalog;
  private readonly spawner: ProcessSpawner;
  private readonly logBuffer: LogBuffer;
  private readonly logger: Logger;
  private readonly stopTimeoutMs: number;
  private readonly captureDrainMs: number;
  private readonly now: () => Date;
  // start, stop and exit reaping run one at a time, in call order
  private readonly exclusive = pLimit(1);

  constructor(options: SupervisorOptions) {
    this.catalog = options.catalog;
    this.spawner = options.spawner || defaultSpawner;
    this.logBuffer = options.logBuffer || new LogBuffer();
    this.logger = options.logger || getLogger('supervisor');
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.captureDrainMs = options.captureDrainMs ?? DEFAULT_CAPTURE_DRAIN_MS;
    this.now = options.now || ((): Date => new Date());
  }

  get state(): SupervisorState {
    return this.slot.state;
  }

  /**
   * The process currently held, including one that is being stopped.
   */
  getCurrent(): ManagedProcessInfo | null {
    if (this.slot.state === 'running' || this.slot.state === 'stopping') {
      return toInfo(this.slot.process);
    }

    return null;
  }

  getLogs(count: number): LogLine[] {
    return this.logBuffer.get(count);
  }

  start(modelId: string): Promise<StartResult> {
    return this.exclusive(() => this.startExclusive(modelId));
  }

  stop(): Promise<StopResult> {
    return this.exclusive(() => this.stopExclusive());
  }

  /**
   * Non-blocking liveness check. A process that exited on its own is
   * released here without sending any signal.
   */
  reapIfExited(): Promise<ReapResult> {
    return this.exclusive(() => this.reapExclusive());
  }

  private async startExclusive(modelId: string): Promise<StartResult> {
    const model = this.catalog.getModel(modelId);

    if (!model) {
      this.logger.warn('Start requested for unknown model', { modelId });
      return { success: false, code: 'UNKNOWN_MODEL', error: `Unknown model: ${modelId}` };
    }

    // Cleared before the implicit stop so the outgoing model's stop lines
    // stay visible ahead of the new launch
    this.logBuffer.clear();

    // Starting is never additive, even for the model already running
    if (this.slot.state !== 'idle') {
      await this.stopExclusive();
    }

    this.slot = { state: 'starting', model };

    const launch = buildLaunchCommand(model);
    this.appendLog(`Starting ${model.name}...`);
    this.appendLog(`Command: ${formatLaunchCommand(launch)}`);

    const log = this.logger.withModel(model.id);
    log.info('Launching model server', { command: launch.command, args: launch.args.length });

    let child: SupervisedChild;

    try {
      child = this.spawner.spawn(launch.command, launch.args);
      await waitForSpawn(child);
    } catch (error) {
      this.slot = { state: 'idle' };
      const message = getErrorCode(error) === 'ENOENT'
        ? `llama-server not found at ${launch.command}`
        : getErrorMessage(error);

      log.error('Failed to launch model server', { error: getErrorMessage(error) });
      return { success: false, code: 'LAUNCH_FAILURE', error: message };
    }

    const pid = child.pid;

    if (pid === undefined) {
      this.slot = { state: 'idle' };
      child.kill('SIGKILL');
      log.error('Model server spawned without a PID');
      return { success: false, code: 'LAUNCH_FAILURE', error: 'Failed to spawn process - no PID assigned' };
    }

    child.on('error', (error: Error) => {
      log.error('Model server process error', { pid, error: error.message });
    });
    child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      log.info('Model server exited', { pid, code, signal });
    });

    const capture = new OutputCapture(
      [child.stdout, child.stderr],
      (line) => {
        this.logBuffer.append(line, this.now());
      },
      log.child('capture')
    );

    this.slot = {
      state: 'running',
      process: { child, pid, model, startedAt: this.now(), capture },
    };

    log.info('Model server started', { pid });

    return { success: true, model: model.id, name: model.name, pid };
  }

  private async stopExclusive(): Promise<StopResult> {
    const slot = this.slot;

    // `starting` and `stopping` only exist inside an exclusive section
    if (slot.state !== 'running') {
      return { success: true, message: NO_MODEL_RUNNING };
    }

    const managed = slot.process;
    const { model } = managed;
    const log = this.logger.withModel(model.id);

    this.slot = { state: 'stopping', process: managed };
    this.appendLog(`Stopping ${model.name}...`);
    log.info('Stopping model server', { pid: managed.pid });

    let failure: string | null = null;

    try {
      await this.terminate(managed, log);
    } catch (error) {
      failure = getErrorMessage(error);
      log.error('Error stopping model server', { pid: managed.pid, error: failure });
    } finally {
      await this.release(managed);
    }

    if (failure !== null) {
      return { success: false, code: 'STOP_FAILED', error: failure, stopped: model.id, name: model.name };
    }

    this.appendLog(`Stopped ${model.name}`);
    log.info('Model server stopped', { pid: managed.pid });

    return { success: true, stopped: model.id, name: model.name };
  }

  private async reapExclusive(): Promise<ReapResult> {
    const slot = this.slot;

    if (slot.state !== 'running') {
      return { status: 'idle' };
    }

    const managed = slot.process;

    if (!hasExited(managed.child)) {
      return { status: 'running', process: toInfo(managed) };
    }

    const message = describeExit(managed.child);
    this.logger.withModel(managed.model.id).warn('Model server exited on its own', {
      pid: managed.pid,
      exitCode: managed.child.exitCode,
      signal: managed.child.signalCode,
    });

    await this.release(managed);

    return { status: 'exited', message };
  }

  /**
   * SIGTERM, bounded wait, then SIGKILL and an unbounded wait.
   */
  private async terminate(managed: ManagedProcess, log: Logger): Promise<void> {
    const { child } = managed;

    if (hasExited(child)) {
      return;
    }

    child.kill('SIGTERM');

    try {
      await waitForExit(child, this.stopTimeoutMs);
    } catch (error) {
      if (!(error instanceof StopTimeoutError)) {
        throw error;
      }

      log.warn('Graceful stop timed out, force killing', {
        pid: managed.pid,
        timeoutMs: this.stopTimeoutMs,
      });
      child.kill('SIGKILL');
      await waitForExit(child);
    }
  }

  private async release(managed: ManagedProcess): Promise<void> {
    this.slot = { state: 'idle' };

    try {
      await managed.capture.finish(this.captureDrainMs);
    } catch (error) {
      this.logger.warn('Output capture did not shut down cleanly', {
        pid: managed.pid,
        error: getErrorMessage(error),
      });
    }
  }

  private appendLog(text: string): void {
    this.logBuffer.append(text, this.now());
  }
}
