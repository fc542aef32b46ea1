import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { LoggingSettings } from './config/logging';
import { errorHandler, notFoundHandler } from './middlewares';
import { createHealthRoutes } from './routes/health';
import { paymentRoutes } from './services/payment';
import { createCorrelationMiddleware, getLoggingPipeline } from './observability';

export interface AppOptions {
  settings?: LoggingSettings;
}

export const createApp = (options: AppOptions = {}): Application => {
  const settings = options.settings ?? getLoggingPipeline().settings;
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({ exposedHeaders: [settings.correlation.headerName] }));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));
  app.use(express.urlencoded({ extended: true }));

  // Correlation first so every later middleware logs inside the request's context
  if (settings.correlation.enabled) {
    app.use(
      createCorrelationMiddleware({
        serviceId: settings.service.name,
        headerName: settings.correlation.headerName,
        generateIfMissing: settings.correlation.generateIfMissing,
        addToResponse: settings.correlation.addToResponse,
      })
    );
  }

  // Routes
  app.use('/health', createHealthRoutes(settings));
  app.use('/payments', paymentRoutes);

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: settings.service.name,
      version: settings.service.version,
      description: 'Transaction correlation and structured logging',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
