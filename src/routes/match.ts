import type { Express } from 'express';
import { z } from 'zod';

import type { StatisticsScope } from '../engine/types.js';
import type { MatchStore } from '../store/index.js';
import { renderCsv, renderJson, renderText } from '../export/index.js';
import { serializePointRecord, serializeSideStatistics } from '../export/json.js';
import { toMatchResponse } from './helpers/responders.js';

const SideEnum = z.enum(['A', 'B']);

const MatchStartSchema = z.object({
  format: z.union([z.string(), z.number()]).nullable().optional(),
  players: z.object({
    A: z.string().trim().min(1),
    B: z.string().trim().min(1),
  }),
  location: z.string().nullable().optional(),
  starting_server: SideEnum,
});

const TiebreakServerSchema = z.object({ server: SideEnum });

const StatisticsQuerySchema = z
  .object({
    scope: z.enum(['match', 'set']).default('match'),
    set: z.coerce.number().int().min(1).optional(),
  })
  .refine((data) => data.scope === 'match' || data.set !== undefined, {
    message: 'set is required when scope=set',
    path: ['set'],
  });

const ExportQuerySchema = z.object({
  format: z.enum(['json', 'csv', 'text']).default('json'),
  table: z.enum(['totals', 'sets', 'points']).default('totals'),
});

export const registerMatchRoutes = (app: Express, store: MatchStore) => {
  app.post('/v1/match', (req, res) => {
    const parsed = MatchStartSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const session = store.startMatch({
      format: parsed.data.format,
      players: parsed.data.players,
      location: parsed.data.location,
      startingServer: parsed.data.starting_server,
    });
    return res.status(201).send(toMatchResponse(session));
  });

  app.get('/v1/match', (_req, res) => {
    const session = store.getActiveMatch();
    return res.send(toMatchResponse(session));
  });

  app.post('/v1/match/undo', (_req, res) => {
    const session = store.getActiveMatch();
    const undone = session.controller.undo();
    return res.send({
      undone,
      ...(undone ? {} : { message: 'nothing to undo' }),
      ...toMatchResponse(session),
    });
  });

  app.post('/v1/match/tiebreak-server', (req, res) => {
    const parsed = TiebreakServerSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const session = store.getActiveMatch();
    session.controller.chooseMatchTiebreakServer(parsed.data.server);
    return res.send(toMatchResponse(session));
  });

  app.post('/v1/match/end', (_req, res) => {
    const session = store.getActiveMatch();
    session.controller.endMatch();
    return res.send(toMatchResponse(session));
  });

  app.get('/v1/match/statistics', (req, res) => {
    const parsed = StatisticsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const session = store.getActiveMatch();
    const scope: StatisticsScope =
      parsed.data.scope === 'set' && parsed.data.set !== undefined
        ? { kind: 'set', index: parsed.data.set - 1 }
        : { kind: 'match' };

    return res.send({
      match_id: session.matchId,
      scope: parsed.data.scope,
      set: scope.kind === 'set' ? scope.index + 1 : null,
      players: session.controller.scoreboard().players,
      statistics: serializeSideStatistics(session.controller.statistics(scope)),
    });
  });

  app.get('/v1/match/points', (_req, res) => {
    const session = store.getActiveMatch();
    return res.send({
      match_id: session.matchId,
      points: session.controller.pointLog().map(serializePointRecord),
    });
  });

  app.get('/v1/match/export', (req, res) => {
    const parsed = ExportQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const state = store.getActiveMatch().controller.snapshot();
    switch (parsed.data.format) {
      case 'json':
        return res.type('application/json').send(renderJson(state));
      case 'csv':
        return res.type('text/csv').send(renderCsv(state, parsed.data.table));
      case 'text':
        return res.type('text/plain').send(renderText(state));
    }
  });
};
