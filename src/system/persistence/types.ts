import type { PersistedState } from '@system/state';

/**
 * Serialised writer for the state file
 */
export interface StateStore {
  /** Read the state file; null when it does not exist yet */
  load(): Promise<PersistedState | null>;
  /** Queue a write; writes never overlap and land in call order */
  save(state: PersistedState): Promise<void>;
  /** Resolve once every queued write has finished */
  flush(): Promise<void>;
}
