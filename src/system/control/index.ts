export { createController } from './control';
export type { ControlConfig, Controller, ControllerDependencies, WeatherStatus, ZoneStatus } from './types';
