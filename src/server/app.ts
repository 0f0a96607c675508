import express from 'express';
import cors from 'cors';
import type { AppConfig } from '../config.js';
import type { ProfileTable } from '../profile/table.js';
import type { SlotStore } from '../slots/slotStore.js';
import { createRequireAuth } from './middleware/auth.js';
import { createRateLimit } from './middleware/rateLimit.js';
import { createHealthRouter } from './routes/health.js';
import { createProfilesRouter } from './routes/profiles.js';
import { createAnalyzeRouter } from './routes/analyze.js';
import { createSlotsRouter } from './routes/slots.js';

export interface AppDeps {
  config: AppConfig;
  profiles: ProfileTable;
  slots: SlotStore;
}

export function createApp({ config, profiles, slots }: AppDeps) {
  const app = express();
  const requireAuth = createRequireAuth(config.server.authToken);

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // API Routes (auth-gated when AUTH_TOKEN is set)
  app.use('/api/health', createHealthRouter(config, profiles));
  app.use('/api/profiles', createProfilesRouter(profiles));        // public
  app.use('/api/analyze', requireAuth, createRateLimit(config.server.rateLimitRpm), createAnalyzeRouter(config.fingerprint));
  app.use('/api/slots', requireAuth, createSlotsRouter(slots));

  return app;
}
