import { Router } from 'express';
import { getProfile, type ProfileTable } from '../../profile/table.js';
import { sendError } from './respond.js';

export function createProfilesRouter(table: ProfileTable): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      ok: true,
      version: table.version,
      profiles: [...table.profiles.values()],
      issues: table.issues,
    });
  });

  router.get('/:name', (req, res) => {
    try {
      res.json({ ok: true, profile: getProfile(req.params.name, table) });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
