import net from 'net';
import { EndpointAddress } from '../config/models';
import { getLogger, Logger } from '../utils';
import { ManagedProcessSource } from './supervisor';

export const HEALTH_CHECK_TIMEOUT_MS = 2_000;

export const HealthReason = {
  NOT_RUNNING: 'not_running',
  PORT_NOT_RESPONDING: 'port_not_responding',
} as const;

export type HealthReport =
  | { healthy: true }
  | { healthy: false; reason: string };

export interface TcpConnector {
  connect(endpoint: EndpointAddress, timeoutMs: number): Promise<void>;
}

export class ConnectTimeoutError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(endpoint: EndpointAddress, timeoutMs: number) {
    super(`Connection to ${endpoint.host}:${endpoint.port} timed out after ${timeoutMs}ms`);
    this.name = 'ConnectTimeoutError';
  }
}

export const defaultTcpConnector: TcpConnector = {
  connect(endpoint: EndpointAddress, timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      socket.setTimeout(timeoutMs);

      socket.once('connect', () => {
        socket.destroy();
        resolve();
      });
      socket.once('timeout', () => {
        socket.destroy();
        reject(new ConnectTimeoutError(endpoint, timeoutMs));
      });
      socket.once('error', (error: Error) => {
        socket.destroy();
        reject(error);
      });

      socket.connect(endpoint.port, endpoint.host);
    });
  },
};

// Errors meaning "nothing is listening yet" rather than a broken network path
const NOT_RESPONDING_CODES = new Set(['ECONNREFUSED', 'ETIMEDOUT', 'ECONNRESET']);

export function classifyConnectError(error: unknown): string {
  const code = error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

  if (code && NOT_RESPONDING_CODES.has(code)) {
    return HealthReason.PORT_NOT_RESPONDING;
  }

  return `transport_error:${code ?? 'UNKNOWN'}`;
}

export interface HealthProbeOptions {
  source: ManagedProcessSource;
  connector?: TcpConnector;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Answers whether the managed server's endpoint accepts connections.
 * Read-only with respect to the supervisor and its log buffer.
 */
export class HealthProbe {
  private readonly source: ManagedProcessSource;
  private readonly connector: TcpConnector;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: HealthProbeOptions) {
    this.source = options.source;
    this.connector = options.connector || defaultTcpConnector;
    this.timeoutMs = options.timeoutMs ?? HEALTH_CHECK_TIMEOUT_MS;
    this.logger = options.logger || getLogger('health-probe');
  }

  async check(): Promise<HealthReport> {
    const current = this.source.getCurrent();

    if (!current) {
      return { healthy: false, reason: HealthReason.NOT_RUNNING };
    }

    try {
      await this.connector.connect(current.endpoint, this.timeoutMs);
      return { healthy: true };
    } catch (error) {
      const reason = classifyConnectError(error);
      this.logger.debug('Health check failed', {
        host: current.endpoint.host,
        port: current.endpoint.port,
        reason,
      });
      return { healthy: false, reason };
    }
  }
}
