export { runEtCycle } from './et-cycle';
export { createScheduler } from './scheduler';
export { collectSamples, configuredSensors } from './helpers';
export type {
  EtCycleConfig,
  EtCycleDependencies,
  EtCycleRequest,
  Scheduler,
  SchedulerConfig,
  SchedulerDependencies
} from './types';
