import { Router } from 'express';
import { summarize, type SessionRegistry } from '../lib/sessionRegistry.js';

export function sessionRouter(registry: SessionRegistry): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ sessions: registry.list() });
  });

  router.get('/:id', (req, res) => {
    const session = registry.get(req.params.id);
    if (!session) {
      res.status(404).json({ error: 'SESSION_NOT_FOUND' });
      return;
    }
    res.json(summarize(session));
  });

  router.delete('/:id', async (req, res, next) => {
    const { id } = req.params;
    if (!registry.get(id)) {
      res.status(404).json({ error: 'SESSION_NOT_FOUND' });
      return;
    }
    try {
      await registry.destroy(id, 'revoked');
      res.json({ status: 'closed' });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
