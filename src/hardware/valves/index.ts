export { findZoneByValve, parseSwitchState } from './valves';
