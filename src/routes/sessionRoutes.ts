import { Router } from 'express';
import type { ProcessSupervisor } from '../lib/processSupervisor.js';
import type { SessionCoordinator } from '../ws/coordinator.js';

export function createSessionRouter(coordinator: SessionCoordinator, supervisor: ProcessSupervisor): Router {
  const router = Router();

  const describeProcess = async (name: string) => {
    const info = supervisor.info(name);
    if (!info) return undefined;
    return { ...info, usage: await supervisor.usage(name) };
  };

  router.get('/', (_req, res) => {
    res.json({
      ...coordinator.stats(),
      members: coordinator.members(),
    });
  });

  router.get('/members', (_req, res) => {
    res.json({ members: coordinator.members() });
  });

  router.get('/processes', (_req, res, next) => {
    Promise.all(supervisor.list().map(describeProcess))
      .then((described) => {
        res.json({ processes: described.flatMap((entry) => (entry ? [entry] : [])) });
      })
      .catch(next);
  });

  router.get('/processes/:name', (req, res, next) => {
    describeProcess(req.params.name)
      .then((entry) => {
        if (!entry) {
          res.status(404).json({ error: 'NOT_FOUND' });
          return;
        }
        res.json(entry);
      })
      .catch(next);
  });

  return router;
}
