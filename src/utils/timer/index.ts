/**
 * TimerAPI backed by Node's timers
 */

import type { TimerAPI, TimerHandle } from '$types/host';

/**
 * Create a timer API over setTimeout/setInterval
 *
 * Handles are plain numbers so callers never see NodeJS.Timeout. Timers are
 * unref'd: log draining and retries never keep the process alive on their own.
 *
 * @returns TimerAPI implementation
 */
export function createNodeTimer(): TimerAPI {
  const timers = new Map<TimerHandle, NodeJS.Timeout>();
  let nextHandle = 1;

  function set(ms: number, repeat: boolean, callback: () => void): TimerHandle {
    const handle = nextHandle++;

    if (repeat) {
      timers.set(handle, setInterval(callback, ms).unref());
    } else {
      timers.set(handle, setTimeout(function() {
        timers.delete(handle);
        callback();
      }, ms).unref());
    }

    return handle;
  }

  function clear(handle: TimerHandle): void {
    const timer = timers.get(handle);
    if (timer === undefined) return;

    clearTimeout(timer);
    clearInterval(timer);
    timers.delete(handle);
  }

  return {
    set: set,
    clear: clear
  };
}
