import express, { type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { AppConfig } from '@/config/types';
import { getModelCache } from '@/models/modelCache';
import calculateRoutes from '@/routes/calculate';
import researchRoutes from '@/routes/research';
import { componentLogger } from '@/services/logger';
import { errorMiddleware } from '@/stability/errorHandlers';
import { createErrorResponse } from '@/utils/errorResponse';

const log = componentLogger('http');

export function createApp(config: AppConfig): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(
    cors({
      origin: config.corsOrigins,
      credentials: true,
    }),
  );

  app.use(express.json({ limit: '100kb' }));

  // Request logging through tslog
  app.use(
    morgan(config.nodeEnv === 'development' ? 'dev' : 'combined', {
      stream: { write: (line: string) => log.info(line.trim()) },
    }),
  );

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
      model: getModelCache(config.model).info(),
      search: config.search.provider,
    });
  });

  // API routes
  app.use('/api/research', researchRoutes);
  app.use('/api/calculate', calculateRoutes);

  app.use((req: Request, res: Response) => {
    res.status(404).json(createErrorResponse(`Route ${req.method} ${req.path} not found`, undefined, 'NOT_FOUND'));
  });
  app.use(errorMiddleware);

  return app;
}
