/**
 * Slack webhook output sink with buffering and retry
 *
 * Sends log messages to a Slack incoming webhook for remote monitoring.
 * - Failed messages are buffered for retry
 * - Exponential backoff retry capped at 60 s
 * - Oldest messages dropped when the buffer is full
 * - Slack failures are reported on the console, never thrown
 */

import type { TimerHandle } from '$types/host';
import type { InitMessage, SlackSink, SlackSinkConfig, SlackSinkDependencies } from '../types';

const MAX_RETRY_DELAY_MS = 60000;

/**
 * Message in the retry buffer
 */
interface BufferedMessage {
  text: string;
  retries: number;
}

/**
 * Create a Slack sink with buffering and retry
 *
 * @param dependencies - fetch, timer and console implementations
 * @param config - Slack sink configuration
 * @returns Slack sink instance
 *
 * @example
 * ```typescript
 * const slackSink = createSlackSink({ fetch: fetch, timer: createNodeTimer(), console: console }, {
 *   enabled: true,
 *   webhookUrl: process.env.SLACK_WEBHOOK_URL ?? '',
 *   bufferSize: 10,
 *   retryDelayMs: 30000,
 *   maxRetries: 5
 * });
 * ```
 */
export function createSlackSink(
  dependencies: SlackSinkDependencies,
  config: SlackSinkConfig
): SlackSink {
  let initialized = false;
  const buffer: BufferedMessage[] = [];
  let retryTimer: TimerHandle | null = null;
  let currentRetryDelay = config.retryDelayMs;
  const inFlight = new Set<Promise<void>>();

  function active(): boolean {
    return config.enabled && config.webhookUrl !== '';
  }

  /**
   * POST one message to the webhook
   * @param message - Message to send
   * @returns True when Slack accepted the message
   */
  async function sendToSlack(message: BufferedMessage): Promise<boolean> {
    try {
      const response = await dependencies.fetch(config.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: message.text })
      });
      if (!response.ok) {
        dependencies.console.warn('Slack send failed: HTTP ' + response.status);
      }
      return response.ok;
    } catch (err) {
      dependencies.console.warn('Slack send exception: ' + String(err));
      return false;
    }
  }

  function track(work: Promise<void>): void {
    inFlight.add(work);
    work.finally(function() { inFlight.delete(work); }).catch(function(err: unknown) {
      dependencies.console.warn('Slack sink error: ' + String(err));
    });
  }

  function scheduleRetry(): void {
    if (retryTimer !== null || buffer.length === 0) return;
    retryTimer = dependencies.timer.set(currentRetryDelay, false, function() {
      retryTimer = null;
      track(processBuffer());
    });
  }

  /**
   * Send buffered messages oldest first until one fails
   */
  async function processBuffer(): Promise<void> {
    while (buffer.length > 0) {
      const message = buffer[0];
      const sent = await sendToSlack(message);

      if (sent) {
        buffer.shift();
        currentRetryDelay = config.retryDelayMs;
        continue;
      }

      message.retries++;
      if (message.retries >= config.maxRetries) {
        dependencies.console.warn('Slack message dropped after ' + config.maxRetries + ' retries');
        buffer.shift();
        currentRetryDelay = config.retryDelayMs;
      } else {
        currentRetryDelay = Math.min(currentRetryDelay * 2, MAX_RETRY_DELAY_MS);
      }
      scheduleRetry();
      return;
    }
  }

  function enqueue(message: BufferedMessage): void {
    if (buffer.length >= config.bufferSize) {
      const dropped = buffer.shift();
      dependencies.console.warn('Slack buffer full, dropping oldest message: ' + (dropped ? dropped.text.substring(0, 50) : ''));
    }
    buffer.push(message);
    scheduleRetry();
  }

  function write(formattedMessage: string): void {
    if (!active()) {
      return;
    }

    const message: BufferedMessage = { text: formattedMessage, retries: 0 };
    track(sendToSlack(message).then(function(sent) {
      if (!sent) {
        enqueue(message);
      }
    }));
  }

  async function initialize(): Promise<InitMessage> {
    initialized = true;
    if (!config.enabled) {
      return { success: true, message: 'Slack disabled' };
    }
    if (config.webhookUrl === '') {
      return { success: false, message: 'Slack enabled but SLACK_WEBHOOK_URL is not set' };
    }
    return { success: true, message: 'Slack webhook configured' };
  }

  async function close(): Promise<void> {
    if (retryTimer !== null) {
      dependencies.timer.clear(retryTimer);
      retryTimer = null;
    }
    await Promise.all(Array.from(inFlight));
  }

  function isInitialized(): boolean {
    return initialized;
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  return {
    write: write,
    initialize: initialize,
    close: close,
    isInitialized: isInitialized,
    getBufferSize: getBufferSize
  };
}
