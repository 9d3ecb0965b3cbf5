import { Router } from 'express';
import type { SessionManager } from '../calls/sessionManager';

export function createHealthRouter(sessionManager: SessionManager): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({ status: 'ok', active_calls: sessionManager.getActiveCount() });
  });

  return router;
}
