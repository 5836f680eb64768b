/**
 * Shared test doubles
 */

import { createLogger } from '@logging';

import type { Logger, LogLevels } from '@logging';
import type { TimerAPI, TimerHandle } from '$types/host';
import type { ApiResponse } from '@server/index';

export const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

/**
 * Manually driven TimerAPI
 */
export interface FakeTimer extends TimerAPI {
  /** Pending timers by handle */
  pending(): { handle: TimerHandle; ms: number; repeat: boolean }[];
  /** Run every pending timer once (one-shots are removed) */
  fireAll(): void;
}

export function createFakeTimer(): FakeTimer {
  const timers = new Map<TimerHandle, { ms: number; repeat: boolean; callback: () => void }>();
  let next = 1;

  return {
    set: function(ms, repeat, callback) {
      const handle = next++;
      timers.set(handle, { ms: ms, repeat: repeat, callback: callback });
      return handle;
    },
    clear: function(handle) {
      timers.delete(handle);
    },
    pending: function() {
      return Array.from(timers.entries()).map(([handle, t]) => ({ handle: handle, ms: t.ms, repeat: t.repeat }));
    },
    fireAll: function() {
      Array.from(timers.entries()).forEach(([handle, t]) => {
        if (!t.repeat) timers.delete(handle);
        t.callback();
      });
    }
  };
}

/**
 * Logger that records formatted lines in memory
 */
export interface RecordingLogger {
  logger: Logger;
  lines: string[];
}

export function createRecordingLogger(): RecordingLogger {
  const lines: string[] = [];
  const logger = createLogger(
    { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
    { timeSource: () => 0, sinks: [{ sink: { write: (msg: string) => { lines.push(msg); } }, minLevel: LOG_LEVELS.DEBUG }] },
    LOG_LEVELS
  );
  return { logger: logger, lines: lines };
}

/**
 * Response that keeps the last status and body
 */
export interface FakeResponse extends ApiResponse {
  statusCode: number;
  body: unknown;
}

export function createFakeResponse(): FakeResponse {
  const res: FakeResponse = {
    statusCode: 200,
    body: null,
    status: function(code) {
      res.statusCode = code;
      return res;
    },
    json: function(body) {
      res.body = body;
    }
  };
  return res;
}
