/**
 * Unit tests for console sink
 */

import { createFakeTimer } from '../../test-utils/fakes';
import { createConsoleSink } from './console-sink';

import type { FakeTimer } from '../../test-utils/fakes';

describe('createConsoleSink', () => {
  let timer: FakeTimer;
  let logged: string[];
  let warned: string[];
  const consoleApi = {
    log: (msg: string) => { logged.push(msg); },
    warn: (msg: string) => { warned.push(msg); }
  };

  beforeEach(() => {
    timer = createFakeTimer();
    logged = [];
    warned = [];
  });

  describe('write', () => {
    it('should buffer messages without printing', () => {
      const sink = createConsoleSink(timer, consoleApi, { bufferSize: 10, drainInterval: 50 });

      sink.write('message 1');
      sink.write('message 2');

      expect(sink.getBufferSize()).toBe(2);
      expect(logged).toEqual([]);
    });

    it('should drop messages when buffer is full', () => {
      const sink = createConsoleSink(timer, consoleApi, { bufferSize: 2, drainInterval: 50 });

      sink.write('message 1');
      sink.write('message 2');
      sink.write('message 3');

      expect(sink.getBufferSize()).toBe(2);
      expect(warned).toEqual(['Console log buffer overflow, dropping message: message 3']);
    });
  });

  describe('initialize', () => {
    it('should start one repeating drain timer', async () => {
      const sink = createConsoleSink(timer, consoleApi, { bufferSize: 10, drainInterval: 50 });

      await expect(sink.initialize()).resolves.toEqual({ success: true, message: 'Console sink initialized' });
      await sink.initialize();

      expect(timer.pending()).toEqual([{ handle: 1, ms: 50, repeat: true }]);
    });

    it('should drain at most ten messages per tick in order', async () => {
      const sink = createConsoleSink(timer, consoleApi, { bufferSize: 50, drainInterval: 50 });
      await sink.initialize();
      for (let i = 0; i < 12; i++) {
        sink.write('m' + i);
      }

      timer.fireAll();

      expect(logged).toHaveLength(10);
      expect(logged[0]).toBe('m0');
      expect(sink.getBufferSize()).toBe(2);

      timer.fireAll();
      expect(logged[11]).toBe('m11');
    });
  });

  describe('close', () => {
    it('should stop the timer and flush everything', async () => {
      const sink = createConsoleSink(timer, consoleApi, { bufferSize: 50, drainInterval: 50 });
      await sink.initialize();
      for (let i = 0; i < 15; i++) {
        sink.write('m' + i);
      }

      await sink.close();

      expect(timer.pending()).toEqual([]);
      expect(logged).toHaveLength(15);
      expect(sink.getBufferSize()).toBe(0);
    });
  });
});
