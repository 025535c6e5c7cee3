import { getElapsedSeconds } from '../utils/timestamp';
import { HealthProbe, HealthReport } from './health-probe';
import { ReapResult } from './supervisor';

export type StatusSnapshot =
  | { running: false; request_count: number }
  | { running: false; message: string; request_count: number }
  | {
      running: true;
      model: string;
      name: string;
      pid: number;
      uptime_seconds: number;
      health: HealthReport;
      request_count: number;
    };

export interface ReapableSupervisor {
  reapIfExited(): Promise<ReapResult>;
}

export interface StatusReporterOptions {
  supervisor: ReapableSupervisor;
  healthProbe: Pick<HealthProbe, 'check'>;
  now?: () => Date;
}

export class StatusReporter {
  private requestCount = 0;
  private readonly supervisor: ReapableSupervisor;
  private readonly healthProbe: Pick<HealthProbe, 'check'>;
  private readonly now: () => Date;

  constructor(options: StatusReporterOptions) {
    this.supervisor = options.supervisor;
    this.healthProbe = options.healthProbe;
    this.now = options.now || ((): Date => new Date());
  }

  get requests(): number {
    return this.requestCount;
  }

  async getStatus(): Promise<StatusSnapshot> {
    this.requestCount++;
    const requestCount = this.requestCount;

    const reaped = await this.supervisor.reapIfExited();

    if (reaped.status === 'idle') {
      return { running: false, request_count: requestCount };
    }

    if (reaped.status === 'exited') {
      return { running: false, message: reaped.message, request_count: requestCount };
    }

    const { process } = reaped;
    const health = await this.healthProbe.check();

    return {
      running: true,
      model: process.modelId,
      name: process.name,
      pid: process.pid,
      uptime_seconds: getElapsedSeconds(process.startedAt, this.now()),
      health,
      request_count: requestCount,
    };
  }
}
