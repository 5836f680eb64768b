/**
 * Inbound event messages
 *
 * Every push from the host platform becomes one of these messages and goes
 * through the dispatcher. Sensor and valve streams each have a single shape.
 */

import type { EntityState } from '@hardware/types';

/**
 * Message type discriminators
 */
export const MESSAGE_TYPES = {
  SENSOR: 'sensor_state',
  VALVE: 'valve_state'
} as const;

export type MessageType = typeof MESSAGE_TYPES[keyof typeof MESSAGE_TYPES];

/**
 * New state of a weather sensor entity
 */
export interface SensorStateMessage {
  type: typeof MESSAGE_TYPES.SENSOR;
  entityId: string;
  state: EntityState;
  /** Epoch seconds */
  timestamp: number;
}

/**
 * New state of a zone valve/switch entity
 */
export interface ValveStateMessage {
  type: typeof MESSAGE_TYPES.VALVE;
  entityId: string;
  state: EntityState;
  timestamp: number;
}

export type InboundMessage = SensorStateMessage | ValveStateMessage;

/**
 * Check that an unknown value can be carried as an entity state
 */
export function isEntityState(value: unknown): value is EntityState {
  return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}
