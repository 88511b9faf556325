import express from 'express';
import cors, { CorsOptions } from 'cors';
import { createRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import type { AppServices, AppSettings } from './types/services.types';
import { logger } from './utils/logging';

const DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:3001',
  'http://localhost:5173',
  'http://localhost:5174',
];

export const buildCorsOptions = (settings: AppSettings): CorsOptions => {
  const allowedOrigins = new Set<string>();
  if (settings.frontendUrl) {
    allowedOrigins.add(settings.frontendUrl);
  }
  settings.corsOrigins.forEach((origin) => allowedOrigins.add(origin));
  if (settings.nodeEnv === 'development') {
    DEV_ORIGINS.forEach((origin) => allowedOrigins.add(origin));
  }

  return {
    origin: (origin, callback) => {
      // Requests without an Origin header (curl, server-to-server)
      if (!origin || allowedOrigins.has(origin)) {
        return callback(null, true);
      }
      // In development, allow all origins if CORS_ORIGINS is not set
      if (settings.nodeEnv === 'development' && settings.corsOrigins.length === 0) {
        return callback(null, true);
      }
      callback(new Error('Not allowed by CORS'));
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
    exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset', 'Retry-After'],
    maxAge: 86400, // 24 hours
    optionsSuccessStatus: 200,
  };
};

export const createApp = (services: AppServices) => {
  const app = express();

  app.use(cors(buildCorsOptions(services.settings)));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/health', async (_req, res) => {
    try {
      await services.checkHealth();
      res.json({ status: 'ok', database: 'connected' });
    } catch (error) {
      logger.error('Health check failed', { error: error instanceof Error ? error.message : String(error) });
      res.status(500).json({ status: 'error', database: 'disconnected' });
    }
  });

  // Locally stored avatars
  app.use('/uploads', express.static(services.settings.uploadDir));

  app.use('/api', createRoutes(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
