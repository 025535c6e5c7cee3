import express, { Application, Request, Response, NextFunction } from 'express';
import { Server, createServer } from 'http';
import path from 'path';
import { AppConfig, ModelCatalog, StaticModelCatalog } from '../config';
import { createAuthMiddleware, createCorsMiddleware, createRequestLogger } from '../middleware';
import { createApiRouter } from '../routes';
import { DefaultSystemStatsService, SystemStatsService } from '../services/system-stats';
import { HealthProbe, StatusReporter, StopResult, Supervisor } from '../supervisor';
import { NotFoundError, createErrorHandler, formatAccessibleUrls, getLogger, Logger } from '../utils';

export const PUBLIC_PATH = path.join(__dirname, '../../public');

export interface HttpServer {
  start(): Promise<void>;
  stop(): Promise<StopResult>;
}

export interface ControlPlane {
  supervisor: Supervisor;
  statusReporter: StatusReporter;
  catalog: ModelCatalog;
  statsService: SystemStatsService;
}

export interface ExpressAppOptions extends ControlPlane {
  apiKey: string;
  host: string;
  port: number;
  publicPath?: string;
}

export function createControlPlane(config: AppConfig): ControlPlane {
  const catalog = new StaticModelCatalog(config.models);
  const supervisor = new Supervisor({ catalog });
  const healthProbe = new HealthProbe({ source: supervisor });
  const statusReporter = new StatusReporter({ supervisor, healthProbe });

  return {
    supervisor,
    statusReporter,
    catalog,
    statsService: new DefaultSystemStatsService(),
  };
}

export function createExpressApp(options: ExpressAppOptions): Application {
  const app = express();
  const publicPath = options.publicPath || PUBLIC_PATH;

  app.disable('x-powered-by');
  app.use(createRequestLogger());
  app.use(createCorsMiddleware());

  // Control panel page (unprotected)
  app.get(['/', '/index.html'], (_req: Request, res: Response) => {
    res.sendFile(path.join(publicPath, 'index.html'));
  });

  // Everything else requires the API key, unknown paths included
  app.use(createAuthMiddleware({ apiKey: options.apiKey }));

  app.use('/api', createApiRouter({
    supervisor: options.supervisor,
    statusReporter: options.statusReporter,
    catalog: options.catalog,
    statsService: options.statsService,
    host: options.host,
    port: options.port,
  }));

  app.use((_req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError());
  });

  app.use(createErrorHandler());

  return app;
}

export interface ServerDependencies {
  config: AppConfig;
  controlPlane?: ControlPlane;
}

export class ExpressHttpServer implements HttpServer {
  private httpServer: Server | null = null;
  private stopping: Promise<StopResult> | null = null;
  private readonly app: Application;
  private readonly config: AppConfig;
  private readonly controlPlane: ControlPlane;
  private readonly logger: Logger;

  constructor(deps: ServerDependencies) {
    this.config = deps.config;
    this.controlPlane = deps.controlPlane || createControlPlane(deps.config);
    this.logger = getLogger('server');
    this.app = createExpressApp({
      ...this.controlPlane,
      apiKey: this.config.apiKey,
      host: this.config.host,
      port: this.config.port,
    });
  }

  getApp(): Application {
    return this.app;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.httpServer = createServer(this.app);

      this.httpServer.on('error', (err: NodeJS.ErrnoException) => {
        const address = `${this.config.host}:${this.config.port}`;

        if (err.code === 'EADDRINUSE') {
          reject(new Error(`Port ${this.config.port} is already in use`));
        } else if (err.code === 'EADDRNOTAVAIL') {
          reject(new Error(`Cannot bind to address ${address}: address not available`));
        } else if (err.code === 'EACCES') {
          reject(new Error(`Cannot bind to ${address}: permission denied`));
        } else {
          reject(new Error(`Failed to start server on ${address}: ${err.message}`));
        }
      });

      this.httpServer.listen(this.config.port, this.config.host, () => {
        this.logger.info('Listening', {
          urls: formatAccessibleUrls(this.config.host, this.config.port),
        });
        resolve();
      });
    });
  }

  /**
   * Stops the managed model server, then the HTTP server. Repeated calls
   * share the first shutdown, so the model is stopped exactly once.
   */
  stop(): Promise<StopResult> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }

    return this.stopping;
  }

  private async shutdown(): Promise<StopResult> {
    const result = await this.controlPlane.supervisor.stop();

    await new Promise<void>((resolve, reject) => {
      if (!this.httpServer) {
        resolve();
        return;
      }

      this.httpServer.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.httpServer = null;
        resolve();
      });
    });

    return result;
  }
}
