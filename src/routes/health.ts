import { Router, Request, Response } from 'express';
import { LoggingSettings } from '../config/logging';

/**
 * Health routes report the service identity the logging pipeline stamps on
 * every record, so operators can match a running instance to its logs.
 */
export const createHealthRoutes = (settings: LoggingSettings): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: settings.service,
      logging: {
        enabled: settings.enabled,
        level: settings.level,
        format: settings.format,
        piiMasking: settings.masking.enabled,
        correlation: settings.correlation.enabled,
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
    res.status(200).json({
      status: 'ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
