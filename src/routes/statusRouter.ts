import type { Router } from 'express';
import express from 'express';
import type { StatusService } from '../core/status/StatusService.js';

export function createStatusRouter(statusService: StatusService): Router {
  const router = express.Router();

  router.get('/test', (_req, res) => {
    res.status(200).json(statusService.getReport());
  });

  router.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  return router;
}
