import { Router, Request, Response } from 'express';
import { ModelCatalog, summarizeModels } from '../config/models';
import { parseRequest } from '../middleware/validation';
import { SystemStatsService } from '../services/system-stats';
import { Supervisor, StatusReporter, formatLogLine } from '../supervisor';
import {
  APP_NAME,
  asyncHandler,
  getLogger,
  getNetworkInfo,
  getVersion,
  NetworkInfo,
} from '../utils';
import { logsQuerySchema, startParamsSchema } from './schemas';

export interface ApiRouterDependencies {
  supervisor: Pick<Supervisor, 'start' | 'stop' | 'getLogs'>;
  statusReporter: Pick<StatusReporter, 'getStatus'>;
  catalog: ModelCatalog;
  statsService: SystemStatsService;
  getNetworkInfo?: () => NetworkInfo;
  host: string;
  port: number;
}

/**
 * JSON control API. Domain failures (unknown model, launch failure) are
 * answered with 200 and `success: false`; only transport problems use
 * error status codes.
 */
export function createApiRouter(deps: ApiRouterDependencies): Router {
  const router = Router();
  const logger = getLogger('api');
  const { supervisor, statusReporter, catalog, statsService } = deps;
  const networkInfo = deps.getNetworkInfo || ((): NetworkInfo => getNetworkInfo(deps.host, deps.port));

  router.get('/status', asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    res.json(await statusReporter.getStatus());
  }));

  router.get('/models', (_req: Request, res: Response) => {
    res.json(summarizeModels(catalog));
  });

  router.get('/stats', asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    res.json(await statsService.collect());
  }));

  router.get('/logs', (req: Request, res: Response) => {
    const { lines } = parseRequest(logsQuerySchema, req.query);
    res.json(supervisor.getLogs(lines).map(formatLogLine));
  });

  router.get('/network', (_req: Request, res: Response) => {
    res.json(networkInfo());
  });

  router.get('/version', (_req: Request, res: Response) => {
    res.json({ version: getVersion(), name: APP_NAME });
  });

  router.post('/start/:modelId', asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { modelId } = parseRequest(startParamsSchema, req.params);
    const result = await supervisor.start(modelId);

    if (result.success) {
      logger.info('Model started via API', { modelId, pid: result.pid, ip: req.ip });
    }

    res.json(result);
  }));

  router.post('/stop', asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const result = await supervisor.stop();
    logger.info('Stop requested via API', { ip: req.ip, success: result.success });
    res.json(result);
  }));

  return router;
}
