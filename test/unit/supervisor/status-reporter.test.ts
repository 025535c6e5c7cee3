import { HealthReport } from '../../../src/supervisor/health-probe';
import { StatusReporter } from '../../../src/supervisor/status-reporter';
import { ReapResult } from '../../../src/supervisor/supervisor';

describe('StatusReporter', () => {
  const startedAt = new Date('2024-05-01T10:00:00.000Z');
  const now = new Date('2024-05-01T10:01:05.900Z');

  let reapIfExited: jest.Mock<Promise<ReapResult>, []>;
  let check: jest.Mock<Promise<HealthReport>, []>;
  let reporter: StatusReporter;

  beforeEach(() => {
    reapIfExited = jest.fn(async (): Promise<ReapResult> => ({ status: 'idle' }));
    check = jest.fn(async (): Promise<HealthReport> => ({ healthy: true }));
    reporter = new StatusReporter({
      supervisor: { reapIfExited },
      healthProbe: { check },
      now: () => now,
    });
  });

  it('should report an idle supervisor', async () => {
    await expect(reporter.getStatus()).resolves.toEqual({ running: false, request_count: 1 });
    expect(check).not.toHaveBeenCalled();
  });

  it('should count every status request', async () => {
    await reporter.getStatus();
    await reporter.getStatus();
    const status = await reporter.getStatus();

    expect(status.request_count).toBe(3);
    expect(reporter.requests).toBe(3);
  });

  it('should report how a process that exited on its own ended', async () => {
    reapIfExited.mockResolvedValueOnce({ status: 'exited', message: 'process exited with code 1' });

    await expect(reporter.getStatus()).resolves.toEqual({
      running: false,
      message: 'process exited with code 1',
      request_count: 1,
    });
  });

  it('should describe a running model with uptime and health', async () => {
    reapIfExited.mockResolvedValue({
      status: 'running',
      process: {
        modelId: 'alpha',
        name: 'Alpha 7B',
        pid: 1001,
        startedAt,
        endpoint: { host: '127.0.0.1', port: 8080 },
      },
    });
    check.mockResolvedValue({ healthy: false, reason: 'port_not_responding' });

    await expect(reporter.getStatus()).resolves.toEqual({
      running: true,
      model: 'alpha',
      name: 'Alpha 7B',
      pid: 1001,
      uptime_seconds: 65,
      health: { healthy: false, reason: 'port_not_responding' },
      request_count: 1,
    });
  });
});
