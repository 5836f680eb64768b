/**
 * Sensor history recorder
 *
 * Keeps a trailing window of raw numeric sensor values per entity so the
 * daily cycle can query the previous day. Values are stored unvalidated;
 * the query path validates them the same way the live path does.
 *
 * Nothing survives a restart, so coverage starts when the recorder is
 * created unless the caller says otherwise.
 */

import type { HistoryPoint } from '$types/host';
import type { HistoryRecorder, HistoryRecorderConfig } from './types';

export function createHistoryRecorder(config: HistoryRecorderConfig): HistoryRecorder {
  const series = new Map<string, HistoryPoint[]>();
  const since = config.availableSince ?? config.timeSource();

  function prune(): void {
    const horizon = config.timeSource() - config.retentionSec;
    series.forEach((points, entityId) => {
      const kept = points.filter((p) => p.timestamp >= horizon);
      if (kept.length === 0) {
        series.delete(entityId);
      } else if (kept.length !== points.length) {
        series.set(entityId, kept);
      }
    });
  }

  return {
    record: function(entityId, value, timestamp) {
      const points = series.get(entityId) ?? [];
      points.push({ value: value, timestamp: timestamp });
      series.set(entityId, points);
      prune();
    },

    query: function(entityId, start, end) {
      const points = series.get(entityId) ?? [];
      const inWindow = points
        .filter((p) => p.timestamp >= start && p.timestamp < end)
        .sort((a, b) => a.timestamp - b.timestamp);
      return Promise.resolve(inWindow);
    },

    availableSince: function() {
      return since;
    }
  };
}
