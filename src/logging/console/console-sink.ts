/**
 * Console output sink with rate-limited buffering
 *
 * Messages are queued and drained a few at a time on a fixed interval, so a
 * burst of sample logs cannot flood stdout. When the buffer is full new
 * messages are dropped with a warning.
 */

import type { TimerAPI, TimerHandle } from '$types/host';
import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI, InitMessage } from '../types';

const MESSAGES_PER_DRAIN = 10;

/**
 * Create a console sink with buffering
 *
 * @param timerApi - Timer API for scheduling drain
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (bufferSize, drainInterval)
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(createNodeTimer(), console, {
 *   bufferSize: 200,
 *   drainInterval: 50
 * });
 * await consoleSink.initialize();
 * consoleSink.write("Hello world");
 * ```
 */
export function createConsoleSink(
  timerApi: TimerAPI,
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): ConsoleSink {
  const buffer: string[] = [];
  let drainTimer: TimerHandle | null = null;

  function drain(): void {
    const batch = buffer.splice(0, MESSAGES_PER_DRAIN);
    for (let i = 0; i < batch.length; i++) {
      consoleApi.log(batch[i]);
    }
  }

  function flush(): void {
    while (buffer.length > 0) {
      drain();
    }
  }

  function write(formattedMessage: string): void {
    if (buffer.length < config.bufferSize) {
      buffer.push(formattedMessage);
    } else {
      consoleApi.warn('Console log buffer overflow, dropping message: ' + formattedMessage);
    }
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  async function initialize(): Promise<InitMessage> {
    if (drainTimer === null) {
      drainTimer = timerApi.set(config.drainInterval, true, drain);
    }
    return { success: true, message: 'Console sink initialized' };
  }

  async function close(): Promise<void> {
    if (drainTimer !== null) {
      timerApi.clear(drainTimer);
      drainTimer = null;
    }
    flush();
  }

  return {
    write: write,
    initialize: initialize,
    close: close,
    flush: flush,
    getBufferSize: getBufferSize
  };
}
