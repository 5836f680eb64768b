/**
 * Request parsing and error mapping
 */

import { isEntityState } from '@events/types';
import { ValidationError, ZoneNotFoundError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';
import { isRecord } from '@validation';

import type { EntityState } from '@hardware/types';
import type { Logger } from '@logging';
import type { DispatchOutcome } from '@system/dispatcher';
import type { EtCycleRequest } from '@system/scheduler';
import type { ApiResponse } from './types';

export interface EventBody {
  entityId: string;
  state: EntityState;
  timestamp: number | undefined;
}

function requireObject(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value === '') {
    throw new ValidationError(key + ' must be a non-empty string');
  }
  return value;
}

/**
 * Parse POST /api/events/* bodies
 */
export function parseEventBody(body: unknown): EventBody {
  const fields = requireObject(body);

  const entityId = fields.entityId;
  if (typeof entityId !== 'string' || entityId === '') {
    throw new ValidationError('entityId must be a non-empty string');
  }

  const state = fields.state;
  if (!isEntityState(state)) {
    throw new ValidationError('state must be a string, number, boolean or null');
  }

  const timestamp = fields.timestamp;
  if (timestamp !== undefined && (!isFiniteNumber(timestamp) || timestamp < 0)) {
    throw new ValidationError('timestamp must be epoch seconds');
  }

  return { entityId: entityId, state: state, timestamp: timestamp };
}

/**
 * Parse PUT /api/zones/:zoneId/balance bodies
 * @returns The requested balance (mm); bounds are checked by the controller
 */
export function parseBalanceBody(body: unknown): number {
  const fields = requireObject(body);
  const balanceMm = fields.balanceMm;
  if (!isFiniteNumber(balanceMm)) {
    throw new ValidationError('balanceMm must be a number');
  }
  return balanceMm;
}

/**
 * Parse POST /api/et/calculate bodies; an absent body means all zones, previous day
 */
export function parseEtRequest(body: unknown): EtCycleRequest {
  if (body === undefined || body === null) return {};
  const fields = requireObject(body);

  const force = fields.force;
  if (force !== undefined && typeof force !== 'boolean') {
    throw new ValidationError('force must be a boolean');
  }

  return {
    zoneId: optionalString(fields, 'zoneId'),
    date: optionalString(fields, 'date'),
    force: force,
  };
}

/**
 * JSON-safe form of a dispatch outcome
 */
export function describeOutcome(outcome: DispatchOutcome): Record<string, unknown> {
  if (outcome.kind === 'rejected') {
    return { kind: outcome.kind, reason: outcome.error.message };
  }
  return { ...outcome };
}

/**
 * Map an error to a response
 * - ZoneNotFoundError: 404
 * - ValidationError: 400
 * - anything else: 500, logged as critical
 */
export function sendError(err: unknown, res: ApiResponse, logger: Logger): void {
  if (err instanceof ZoneNotFoundError) {
    res.status(404).json({ error: err.message });
    return;
  }

  if (err instanceof ValidationError) {
    res.status(400).json({ error: err.message });
    return;
  }

  logger.critical('API request failed: ' + (err instanceof Error ? err.message : String(err)));
  res.status(500).json({ error: 'Internal server error' });
}
