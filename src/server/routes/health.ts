import { Router } from 'express';
import type { AppConfig } from '../../config.js';
import type { ProfileTable } from '../../profile/table.js';

const startedAt = Date.now();

export function createHealthRouter(config: AppConfig, profiles: ProfileTable): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      ok: true,
      version: process.env.APP_VERSION ?? 'dev',
      node: process.version,
      profileTable: config.profileTablePath,
      profileTableVersion: profiles.version,
      profiles: profiles.profiles.size,
      profileIssues: profiles.issues.length,
      slotDir: config.slotDir,
      dispatchIntervalMs: config.dispatch.minIntervalMs,
      uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  return router;
}
