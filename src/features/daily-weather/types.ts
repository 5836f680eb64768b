import type { Reading, SensorKind, TimeWindow } from '$types/common';

/**
 * Running sums for one averaged field
 */
export interface FieldAccumulator {
  sum: number;
  count: number;
  min: Reading;
  max: Reading;
}

/**
 * One day of weather, summarised. A field is null when no valid sample of its
 * kind fell inside the window.
 */
export interface DailyWeatherAggregate {
  readonly window: TimeWindow;
  readonly temperatureMean: Reading;
  readonly temperatureMin: Reading;
  readonly temperatureMax: Reading;
  readonly humidityMean: Reading;
  /** Rainfall from counter increases, not an average */
  readonly precipitationMm: Reading;
  readonly windMean: Reading;
  readonly solarMean: Reading;
  readonly pressureMean: Reading;
  readonly counts: Readonly<Record<SensorKind, number>>;
}
