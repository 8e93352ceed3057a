import { Router } from 'express';
import type { StorageConfig } from '../config.js';

export function createHealthRouter(storage: StorageConfig): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ status: 'ok', time: new Date().toISOString(), storage: storage.driver });
  });

  return router;
}
