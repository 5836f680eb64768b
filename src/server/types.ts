/**
 * HTTP surface type definitions
 *
 * Handlers see only the parts of express's request and response they use,
 * so tests can drive them with plain objects.
 */

import type { Logger } from '@logging';
import type { Controller } from '@system/control';

export interface ApiRequest {
  params: Record<string, string>;
  body: unknown;
  headers: { authorization?: string };
}

export interface ApiResponse {
  status(code: number): ApiResponse;
  json(body: unknown): void;
}

export type NextHandler = () => void;

export interface ServerDependencies {
  readonly controller: Controller;
  /** Shared secret for /api routes; empty means not configured */
  readonly apiToken: string;
  readonly logger: Logger;
  /** Current time in epoch seconds */
  readonly timeSource: () => number;
}

export interface ApiHandlers {
  health(req: ApiRequest, res: ApiResponse): void;
  sensorEvent(req: ApiRequest, res: ApiResponse): void;
  valveEvent(req: ApiRequest, res: ApiResponse): void;
  listZones(req: ApiRequest, res: ApiResponse): void;
  getZone(req: ApiRequest, res: ApiResponse): void;
  setBalance(req: ApiRequest, res: ApiResponse): void;
  calculateEt(req: ApiRequest, res: ApiResponse): Promise<void>;
  weather(req: ApiRequest, res: ApiResponse): void;
}
