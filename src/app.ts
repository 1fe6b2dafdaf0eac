import express from 'express';
import cors from 'cors';
import type { ProcessSupervisor } from './lib/processSupervisor.js';
import { createHealthRouter } from './routes/health.js';
import { createSessionRouter } from './routes/sessionRoutes.js';
import type { SessionCoordinator } from './ws/coordinator.js';

export interface AppDependencies {
  coordinator: SessionCoordinator;
  supervisor: ProcessSupervisor;
  corsOrigins: string[];
}

export function createApp({ coordinator, supervisor, corsOrigins }: AppDependencies): express.Express {
  const app = express();

  app.use(
    cors({
      origin: corsOrigins,
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req, res) => {
    res.json({
      name: 'Watch Party Relay',
      version: '0.1.0',
      websocket: '/ws',
    });
  });

  app.use('/health', createHealthRouter(coordinator, supervisor));
  app.use('/api/session', createSessionRouter(coordinator, supervisor));

  return app;
}
