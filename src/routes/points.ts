import type { Express } from 'express';
import { z } from 'zod';

import { RALLY_OUTCOMES, RETURN_OUTCOMES, SERVE_OUTCOMES } from '../engine/types.js';
import type { MatchStore } from '../store/index.js';
import { toMatchResponse, toProgressResponse } from './helpers/responders.js';

const SideEnum = z.enum(['A', 'B']);

const ServeSchema = z.object({ outcome: z.enum(SERVE_OUTCOMES) });

const ReturnSchema = z.object({ outcome: z.enum(RETURN_OUTCOMES) });

const RallySchema = z.object({
  outcome: z.enum(RALLY_OUTCOMES),
  net_mark: SideEnum.nullable().optional(),
});

export const registerPointRoutes = (app: Express, store: MatchStore) => {
  app.post('/v1/match/points/begin', (_req, res) => {
    const session = store.getActiveMatch();
    const progress = session.controller.beginPoint();
    return res.status(201).send(toProgressResponse(session, progress));
  });

  app.post('/v1/match/points/serve', (req, res) => {
    const parsed = ServeSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const session = store.getActiveMatch();
    const progress = session.controller.submitServeOutcome(parsed.data.outcome);
    return res.send(toProgressResponse(session, progress));
  });

  app.post('/v1/match/points/return', (req, res) => {
    const parsed = ReturnSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const session = store.getActiveMatch();
    const progress = session.controller.submitReturnOutcome(parsed.data.outcome);
    return res.send(toProgressResponse(session, progress));
  });

  app.post('/v1/match/points/rally', (req, res) => {
    const parsed = RallySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const session = store.getActiveMatch();
    const progress = session.controller.submitRallyOutcome(
      parsed.data.outcome,
      parsed.data.net_mark ?? undefined
    );
    return res.send(toProgressResponse(session, progress));
  });

  app.post('/v1/match/points/abort', (_req, res) => {
    const session = store.getActiveMatch();
    const aborted = session.controller.abortPoint();
    return res.send({ aborted, ...toMatchResponse(session) });
  });
};
