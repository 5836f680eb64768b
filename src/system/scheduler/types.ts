import type { IrrigationConfig } from '$types/config';
import type { HistoryAPI } from '$types/host';
import type { Logger } from '@logging';
import type { Ledger } from '@system/ledger';
import type { ControllerState, EtReport } from '@system/state';

export type EtCycleConfig = Pick<
  IrrigationConfig,
  | 'LATITUDE'
  | 'LONGITUDE'
  | 'ELEVATION_M'
  | 'TIMEZONE'
  | 'SENSOR_ENTITIES'
  | 'ZONES'
  | 'SENSOR_RANGES'
  | 'MAX_PRECIPITATION_DELTA_MM'
>;

export interface EtCycleDependencies {
  readonly config: EtCycleConfig;
  readonly ledger: Ledger;
  readonly state: ControllerState;
  readonly history: HistoryAPI;
  readonly logger: Logger;
  /** Current time in epoch seconds */
  readonly timeSource: () => number;
  /** Called after the report or runtime counters changed */
  readonly onChange: () => void;
}

/**
 * On-demand trigger parameters
 */
export interface EtCycleRequest {
  /** Restrict to one zone; all zones when absent */
  readonly zoneId?: string;
  /** Local date (YYYY-MM-DD); the previous local day when absent */
  readonly date?: string;
  /** Replace ET already applied for the date instead of skipping */
  readonly force?: boolean;
}

export type SchedulerConfig = EtCycleConfig & Pick<IrrigationConfig, 'ET_CRON' | 'ET_CATCH_UP_ON_BOOT'>;

export interface SchedulerDependencies extends EtCycleDependencies {
  readonly config: SchedulerConfig;
}

export interface Scheduler {
  /** Schedule the daily job */
  start(): void;
  stop(): void;
  /** If enabled, clear runtime-today left from before local midnight and run the cycle for the previous local day; never rejects */
  catchUp(): Promise<EtReport | null>;
  /** The scheduled job body: reset runtime-today, then run the cycle; never rejects */
  runDaily(): Promise<EtReport | null>;
}
