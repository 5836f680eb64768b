/**
 * State file persistence
 *
 * The whole state is rewritten on each save: JSON to a temp file beside the
 * target, then rename. A crash mid-write leaves the previous file intact.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { ValidationError } from '$types/errors';

import { isPersistedState } from './helpers';

import type { PersistedState } from '@system/state';
import type { StateStore } from './types';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read and check a state file
 * @param filePath - State file path
 * @returns Parsed state, or null when the file does not exist
 * @throws ValidationError when the file is not a valid state document
 */
export async function readStateFile(filePath: string): Promise<PersistedState | null> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ValidationError('State file ' + filePath + ' is not valid JSON: ' + String(err));
  }

  if (!isPersistedState(parsed)) {
    throw new ValidationError('State file ' + filePath + ' does not match the expected format');
  }
  return parsed;
}

/**
 * Write a state file atomically
 * @param filePath - Target path; its directory is created if missing
 * @param state - State to write
 */
export async function writeStateFile(filePath: string, state: PersistedState): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = filePath + '.' + process.pid + '.tmp';
  await fs.writeFile(tmp, JSON.stringify(state, null, 2) + '\n', 'utf8');
  await fs.rename(tmp, filePath);
}

/**
 * Create a store for one state file
 * @param filePath - State file path
 */
export function createStateStore(filePath: string): StateStore {
  let queue: Promise<void> = Promise.resolve();

  return {
    load: function() {
      return readStateFile(filePath);
    },

    save: function(state) {
      const write = queue.then(() => writeStateFile(filePath, state));
      // A failed write must not block the ones after it
      queue = write.catch(() => undefined);
      return write;
    },

    flush: function() {
      return queue;
    }
  };
}
