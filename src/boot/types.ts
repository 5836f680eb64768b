import type { IrrigationConfig } from '$types/config';
import type { TimerAPI } from '$types/host';
import type { ConsoleAPI, FetchLike, Logger } from '@logging';
import type { Controller } from '@system/control';
import type { Dispatcher } from '@system/dispatcher';
import type { HistoryRecorder } from '@system/history';
import type { Ledger } from '@system/ledger';
import type { StateStore } from '@system/persistence';
import type { Scheduler } from '@system/scheduler';
import type { ControllerState } from '@system/state';

/**
 * Host services injected at boot
 */
export interface InitDependencies {
  timer: TimerAPI;
  console: ConsoleAPI & { error(message: string): void };
  fetch: FetchLike;
  /** Current time in epoch seconds */
  timeSource: () => number;
  store: StateStore;
}

/**
 * Fully wired service
 */
export interface Service {
  config: IrrigationConfig;
  logger: Logger;
  state: ControllerState;
  ledger: Ledger;
  history: HistoryRecorder;
  dispatcher: Dispatcher;
  scheduler: Scheduler;
  controller: Controller;
  store: StateStore;
  /** Queue a write of the current state */
  persist(): void;
}
