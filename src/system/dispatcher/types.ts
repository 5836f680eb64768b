import type { IrrigationConfig } from '$types/config';
import type { AnomalousDeltaError, SensorRangeError } from '$types/errors';
import type { Logger } from '@logging';
import type { InboundMessage } from '@events/types';
import type { EntityKind } from '@hardware/sensors';
import type { ValveTransition } from '@features/runtime-tracker';
import type { HistoryRecorder } from '@system/history';
import type { Ledger } from '@system/ledger';
import type { ControllerState } from '@system/state';

export type DispatcherConfig = Pick<
  IrrigationConfig,
  'SENSOR_ENTITIES' | 'ZONES' | 'SENSOR_RANGES' | 'MAX_PRECIPITATION_DELTA_MM'
>;

export interface DispatcherDependencies {
  readonly config: DispatcherConfig;
  readonly ledger: Ledger;
  readonly state: ControllerState;
  readonly history: HistoryRecorder;
  readonly logger: Logger;
  /** Called after tracker or baseline state changed (ledger changes report themselves) */
  readonly onChange: () => void;
}

/**
 * What happened to one inbound message
 * - ignored: unconfigured entity or a non-numeric/non-switch state
 * - rejected: reading discarded with the error that explains why
 * - recorded: reading stored, no balance change
 * - rain: precipitation counter increase credited to every zone
 * - valve: valve transition processed for a zone
 */
export type DispatchOutcome =
  | { readonly kind: 'ignored'; readonly reason: string }
  | { readonly kind: 'rejected'; readonly error: SensorRangeError | AnomalousDeltaError }
  | { readonly kind: 'recorded'; readonly sensor: EntityKind; readonly value: number }
  | { readonly kind: 'rain'; readonly mm: number }
  | { readonly kind: 'valve'; readonly zoneId: string; readonly transition: ValveTransition };

export interface Dispatcher {
  dispatch(message: InboundMessage): DispatchOutcome;
}
