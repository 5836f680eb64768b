export { createDispatcher } from './dispatcher';
export type { Dispatcher, DispatcherConfig, DispatcherDependencies, DispatchOutcome } from './types';
