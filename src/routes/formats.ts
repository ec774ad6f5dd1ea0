import type { Express } from 'express';

import { listSupportedFormats } from '../formats/index.js';

export const registerFormatRoutes = (app: Express) => {
  app.get('/v1/formats', (_req, res) => res.send({ formats: listSupportedFormats() }));
};
