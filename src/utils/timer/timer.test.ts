/**
 * Tests for the Node timer adapter
 */

import { createNodeTimer } from './index';

describe('createNodeTimer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should fire a one-shot timer once', () => {
    const timer = createNodeTimer();
    const callback = vi.fn();

    timer.set(100, false, callback);
    vi.advanceTimersByTime(350);

    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('should repeat an interval timer', () => {
    const timer = createNodeTimer();
    const callback = vi.fn();

    timer.set(100, true, callback);
    vi.advanceTimersByTime(350);

    expect(callback).toHaveBeenCalledTimes(3);
  });

  it('should stop a cleared timer', () => {
    const timer = createNodeTimer();
    const callback = vi.fn();

    const handle = timer.set(100, true, callback);
    vi.advanceTimersByTime(150);
    timer.clear(handle);
    vi.advanceTimersByTime(500);

    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('should return distinct handles', () => {
    const timer = createNodeTimer();
    const a = timer.set(10, false, vi.fn());
    const b = timer.set(10, false, vi.fn());

    expect(a).not.toBe(b);
  });

  it('should ignore unknown handles', () => {
    const timer = createNodeTimer();
    expect(() => timer.clear(999)).not.toThrow();
  });
});
