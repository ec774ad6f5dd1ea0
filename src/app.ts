import express from 'express';
import type { Express, ErrorRequestHandler } from 'express';

import type { MatchStore } from './store/index.js';
import { MatchLookupError } from './store/index.js';
import { InvariantViolationError, ProtocolViolationError } from './engine/errors.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerFormatRoutes } from './routes/formats.js';
import { registerMatchRoutes } from './routes/match.js';
import { registerPointRoutes } from './routes/points.js';

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  const payload = serializeError(err);
  if (payload.log) {
    // eslint-disable-next-line no-console
    console.error(payload.log.context, payload.log.error);
  }

  res.status(payload.status).json(payload.body);
};

const serializeError = (err: unknown): {
  status: number;
  body: Record<string, unknown>;
  log?: { error: unknown; context: string };
} => {
  if (err instanceof MatchLookupError) {
    return { status: 404, body: { error: 'match_not_found', message: err.message } };
  }

  if (err instanceof ProtocolViolationError) {
    return {
      status: err.code === 'set_not_found' ? 404 : 409,
      body: { error: err.code, message: err.message },
    };
  }

  if (err instanceof InvariantViolationError) {
    return {
      status: 500,
      body: { error: 'invariant_violation', message: err.message },
      log: { error: err, context: 'invariant_violation' },
    };
  }

  if (err instanceof SyntaxError) {
    return { status: 400, body: { error: 'invalid_json', message: err.message } };
  }

  return {
    status: 500,
    body: { error: 'internal_error', message: 'Unexpected error' },
    log: { error: err, context: 'unhandled_error' },
  };
};

export const createApp = (store: MatchStore): Express => {
  const app = express();
  app.use(express.json());

  registerHealthRoutes(app, store);
  registerFormatRoutes(app);
  registerMatchRoutes(app, store);
  registerPointRoutes(app, store);

  app.use(errorHandler);

  return app;
};
