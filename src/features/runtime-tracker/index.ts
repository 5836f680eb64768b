export {
  createRuntimeTrackerState,
  discardIncompleteRun,
  handleValveTransition,
  resetDailyRuntime,
  waterForDuration
} from './runtime-tracker';
export type { DiscardResult, IrrigationRun, RuntimeTrackerState, TransitionResult, ValveTransition } from './types';
