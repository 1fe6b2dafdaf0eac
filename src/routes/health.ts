import { Router } from 'express';
import os from 'node:os';
import type { ProcessSupervisor } from '../lib/processSupervisor.js';
import type { SessionCoordinator } from '../ws/coordinator.js';

export function createHealthRouter(coordinator: SessionCoordinator, supervisor: ProcessSupervisor): Router {
  const router = Router();

  router.get('/', (_req, res, next) => {
    const memory = process.memoryUsage();
    const processes = supervisor.list();
    Promise.all(processes.map((name) => supervisor.usage(name)))
      .then((samples) => {
        const live = samples.flatMap((sample) => (sample ? [sample] : []));
        res.json({
          status: 'ok',
          uptime: process.uptime(),
          viewers: coordinator.stats().viewers,
          processes: {
            total: processes.length,
            running: processes.filter((name) => supervisor.isRunning(name)).length,
            cpuPercent: live.reduce((sum, sample) => sum + sample.cpuPercent, 0),
            memoryBytes: live.reduce((sum, sample) => sum + sample.memoryBytes, 0),
          },
          load: os.loadavg(),
          memory: {
            rss: memory.rss,
            heapUsed: memory.heapUsed,
          },
        });
      })
      .catch(next);
  });

  return router;
}
