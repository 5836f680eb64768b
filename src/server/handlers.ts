/**
 * Route handlers
 */

import { describeOutcome, parseBalanceBody, parseEtRequest, parseEventBody, sendError } from './helpers';

import type { ApiHandlers, ApiRequest, ApiResponse, ServerDependencies } from './types';

/**
 * Create the handlers behind the HTTP routes
 * @param deps - Controller, logger and clock
 */
export function createHandlers(deps: ServerDependencies): ApiHandlers {
  const controller = deps.controller;
  const logger = deps.logger;

  function guarded(body: (req: ApiRequest, res: ApiResponse) => void) {
    return function(req: ApiRequest, res: ApiResponse): void {
      try {
        body(req, res);
      } catch (err) {
        sendError(err, res, logger);
      }
    };
  }

  return {
    health: function(_req, res) {
      res.json({ status: 'ok', timestamp: new Date(deps.timeSource() * 1000).toISOString() });
    },

    // ═══════════════════════════════════════════════════════════════
    // EVENTS
    // ═══════════════════════════════════════════════════════════════

    sensorEvent: guarded(function(req, res) {
      const event = parseEventBody(req.body);
      const outcome = controller.handleSensorEvent(event.entityId, event.state, event.timestamp);
      res.json(describeOutcome(outcome));
    }),

    valveEvent: guarded(function(req, res) {
      const event = parseEventBody(req.body);
      const outcome = controller.handleValveEvent(event.entityId, event.state, event.timestamp);
      res.json(describeOutcome(outcome));
    }),

    // ═══════════════════════════════════════════════════════════════
    // ZONES
    // ═══════════════════════════════════════════════════════════════

    listZones: guarded(function(_req, res) {
      res.json({ zones: controller.listZones() });
    }),

    getZone: guarded(function(req, res) {
      res.json(controller.getZone(req.params.zoneId));
    }),

    setBalance: guarded(function(req, res) {
      const balanceMm = parseBalanceBody(req.body);
      res.json(controller.setBalance(req.params.zoneId, balanceMm));
    }),

    // ═══════════════════════════════════════════════════════════════
    // ET AND WEATHER
    // ═══════════════════════════════════════════════════════════════

    calculateEt: async function(req, res) {
      try {
        const report = await controller.calculateEt(parseEtRequest(req.body));
        res.json(report);
      } catch (err) {
        sendError(err, res, logger);
      }
    },

    weather: guarded(function(_req, res) {
      res.json(controller.getWeather());
    })
  };
}
