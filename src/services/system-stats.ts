/**
 * System Stats Service
 * Best-effort GPU and memory readings for the control panel
 */

import { execFile } from 'child_process';
import { freemem, totalmem } from 'os';
import { promisify } from 'util';
import { getErrorMessage, getLogger, Logger } from '../utils';

const execFileAsync = promisify(execFile);

export const STATS_COMMAND_TIMEOUT_MS = 5_000;

const NVIDIA_SMI_ARGS = [
  '--query-gpu=name,memory.used,memory.total,utilization.gpu,temperature.gpu',
  '--format=csv,noheader,nounits',
];

const BYTES_PER_GB = 1024 * 1024 * 1024;

export interface GpuStats {
  name: string;
  vram_used_mb: number;
  vram_total_mb: number;
  utilization: number;
  temp_c: number;
}

export interface MemoryStats {
  used_gb: number;
  total_gb: number;
}

export interface SystemStats {
  gpu: GpuStats | null;
  memory: MemoryStats | null;
}

// ============================================================================
// Command Runner (for DI / testability)
// ============================================================================

export interface CommandRunnerOptions {
  timeoutMs: number;
}

export interface CommandRunner {
  exec(command: string, args: string[], options: CommandRunnerOptions): Promise<{ stdout: string; stderr: string }>;
}

export class DefaultCommandRunner implements CommandRunner {
  async exec(command: string, args: string[], options: CommandRunnerOptions): Promise<{ stdout: string; stderr: string }> {
    return execFileAsync(command, args, {
      encoding: 'utf-8',
      timeout: options.timeoutMs,
      windowsHide: true,
    });
  }
}

export interface MemoryReader {
  total(): number;
  free(): number;
}

const osMemoryReader: MemoryReader = {
  total: () => totalmem(),
  free: () => freemem(),
};

// ============================================================================
// Parsing
// ============================================================================

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Parse the first GPU row of nvidia-smi CSV output.
 */
export function parseNvidiaSmiOutput(stdout: string): GpuStats | null {
  const firstLine = stdout.trim().split('\n')[0];

  if (!firstLine) {
    return null;
  }

  const parts = firstLine.split(',').map((part) => part.trim());

  if (parts.length < 5) {
    return null;
  }

  const [name, used, total, utilization, temp] = parts;
  const numbers = [used, total, utilization, temp].map((value) => parseInt(value ?? '', 10));

  if (!name || numbers.some((value) => isNaN(value))) {
    return null;
  }

  const [vramUsed = 0, vramTotal = 0, util = 0, tempC = 0] = numbers;

  return {
    name,
    vram_used_mb: vramUsed,
    vram_total_mb: vramTotal,
    utilization: util,
    temp_c: tempC,
  };
}

export function toMemoryStats(totalBytes: number, freeBytes: number): MemoryStats | null {
  if (totalBytes <= 0) {
    return null;
  }

  return {
    used_gb: roundToTenth((totalBytes - freeBytes) / BYTES_PER_GB),
    total_gb: roundToTenth(totalBytes / BYTES_PER_GB),
  };
}

// ============================================================================
// Service
// ============================================================================

export interface SystemStatsService {
  collect(): Promise<SystemStats>;
}

export interface SystemStatsServiceDependencies {
  runner?: CommandRunner;
  memory?: MemoryReader;
  logger?: Logger;
  timeoutMs?: number;
}

export class DefaultSystemStatsService implements SystemStatsService {
  private readonly runner: CommandRunner;
  private readonly memory: MemoryReader;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(deps: SystemStatsServiceDependencies = {}) {
    this.runner = deps.runner || new DefaultCommandRunner();
    this.memory = deps.memory || osMemoryReader;
    this.logger = deps.logger || getLogger('system-stats');
    this.timeoutMs = deps.timeoutMs ?? STATS_COMMAND_TIMEOUT_MS;
  }

  async collect(): Promise<SystemStats> {
    return {
      gpu: await this.collectGpu(),
      memory: this.collectMemory(),
    };
  }

  private async collectGpu(): Promise<GpuStats | null> {
    try {
      const { stdout } = await this.runner.exec('nvidia-smi', NVIDIA_SMI_ARGS, {
        timeoutMs: this.timeoutMs,
      });
      return parseNvidiaSmiOutput(stdout);
    } catch (error) {
      this.logger.debug('GPU stats unavailable', { error: getErrorMessage(error) });
      return null;
    }
  }

  private collectMemory(): MemoryStats | null {
    try {
      return toMemoryStats(this.memory.total(), this.memory.free());
    } catch (error) {
      this.logger.debug('Memory stats unavailable', { error: getErrorMessage(error) });
      return null;
    }
  }
}
