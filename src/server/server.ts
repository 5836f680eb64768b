/**
 * HTTP server
 */

import express, { Router } from 'express';

import { createTokenAuth } from './auth';
import { createHandlers } from './handlers';

import type { ErrorRequestHandler, Express } from 'express';
import type { ServerDependencies } from './types';

/**
 * Create the express app
 *
 * GET /health is open; everything under /api needs the API token.
 *
 * @param deps - Controller, token, logger and clock
 */
export function createServer(deps: ServerDependencies): Express {
  const app = express();
  const handlers = createHandlers(deps);
  const tokenAuth = createTokenAuth(deps.apiToken);

  app.use(express.json());

  // Health check (no auth required)
  app.get('/health', (req, res) => handlers.health(req, res));

  const api = Router();
  api.post('/events/sensor', (req, res) => handlers.sensorEvent(req, res));
  api.post('/events/valve', (req, res) => handlers.valveEvent(req, res));
  api.get('/zones', (req, res) => handlers.listZones(req, res));
  api.get('/zones/:zoneId', (req, res) => handlers.getZone(req, res));
  api.put('/zones/:zoneId/balance', (req, res) => handlers.setBalance(req, res));
  api.post('/et/calculate', (req, res) => handlers.calculateEt(req, res));
  api.get('/weather', (req, res) => handlers.weather(req, res));

  app.use('/api', (req, res, next) => tokenAuth(req, res, next), api);

  const malformedBody: ErrorRequestHandler = (err, _req, res, next) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    next(err);
  };
  app.use(malformedBody);

  return app;
}
