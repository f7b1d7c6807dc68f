import { Router, Request, Response } from 'express';
import { BlobStore } from '../storage';

export const createHealthRoutes = (store: BlobStore): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const isHealthy = store.isReady();

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services: {
        storage: {
          driver: store.driver,
          ready: isHealthy,
        },
      },
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const isReady = store.isReady();

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
