/**
 * Control facade type definitions
 */

import type { IrrigationConfig } from '$types/config';
import type { Logger } from '@logging';
import type { EntityState } from '@hardware/types';
import type { RuntimePlan } from '@core/irrigation-runtime';
import type { Dispatcher, DispatchOutcome } from '@system/dispatcher';
import type { Ledger } from '@system/ledger';
import type { EtCycleRequest } from '@system/scheduler';
import type { ControllerState, EtReport } from '@system/state';

export type ControlConfig = Pick<IrrigationConfig, 'ZONES' | 'BALANCE_OVERRIDE_MIN_MM' | 'BALANCE_OVERRIDE_MAX_MM'>;

export interface ControllerDependencies {
  readonly config: ControlConfig;
  readonly ledger: Ledger;
  readonly state: ControllerState;
  readonly dispatcher: Dispatcher;
  /** Runs the daily ET pipeline */
  readonly runCycle: (request: EtCycleRequest) => Promise<EtReport>;
  readonly logger: Logger;
  /** Current time in epoch seconds */
  readonly timeSource: () => number;
}

/**
 * Everything the API reports about one zone
 */
export interface ZoneStatus {
  id: string;
  name: string;
  valveEntity: string;
  precipitationRate: number;
  cropCoefficient: number;
  balanceMm: number;
  lastEtDate: string | null;
  /** Runtime to bring the balance to 0, ignoring forecast and limits */
  requiredRuntimeSec: number;
  plan: RuntimePlan;
  runtimeTodaySec: number;
  valveOpen: boolean;
  lastOffAt: number | null;
}

export interface WeatherStatus {
  latest: ControllerState['latest'];
  lastEtReport: EtReport | null;
}

/**
 * Operations exposed to the HTTP API
 */
export interface Controller {
  handleSensorEvent(entityId: string, state: EntityState, timestamp?: number): DispatchOutcome;
  handleValveEvent(entityId: string, state: EntityState, timestamp?: number): DispatchOutcome;
  listZones(): ZoneStatus[];
  /** @throws ZoneNotFoundError */
  getZone(zoneId: string): ZoneStatus;
  /** User override; @throws ValidationError outside the override bounds */
  setBalance(zoneId: string, balanceMm: number): ZoneStatus;
  calculateEt(request: EtCycleRequest): Promise<EtReport>;
  getWeather(): WeatherStatus;
}
