import type { Express } from 'express';

import type { MatchStore } from '../store/index.js';

export const registerHealthRoutes = (app: Express, store: MatchStore) => {
  app.get('/health', (_req, res) => res.status(200).send({ ok: true, match_active: store.hasActiveMatch() }));
};
