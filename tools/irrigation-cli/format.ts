/**
 * Plain-text rendering of API responses
 * Colors are applied by the command layer
 */

import type { EtReport, WeatherStatus, ZoneStatus } from './types'

function mm(value: number): string {
  return `${value.toFixed(2)}mm`
}

export function formatZone(zone: ZoneStatus): string[] {
  return [
    `${zone.name} [${zone.id}]`,
    `  Balance: ${mm(zone.balanceMm)} | Last ET: ${zone.lastEtDate ?? 'never'}`,
    `  Plan: ${zone.plan.reason} (${zone.plan.clampedRuntimeSec}s of ${zone.plan.requiredRuntimeSec}s required)`,
    `  Valve: ${zone.valveOpen ? 'OPEN' : 'closed'} | Today: ${zone.runtimeTodaySec}s`,
  ]
}

export function formatReport(report: EtReport): string[] {
  if (report.et0Mm === null || report.method === null) {
    return [`ET for ${report.date} skipped: ${report.skippedReason ?? 'unknown reason'}`]
  }

  const lines = [`ET₀ ${mm(report.et0Mm)} for ${report.date} (${report.method})`]
  for (const zone of report.zones) {
    lines.push(`  ${zone.zoneId}: ETc ${mm(zone.etcMm)} ${zone.outcome}`)
  }
  return lines
}

export function formatWeather(weather: WeatherStatus): string[] {
  const entries = Object.entries(weather.latest).sort(([a], [b]) => a.localeCompare(b))
  if (entries.length === 0) {
    return ['No sensor readings yet']
  }

  return entries.map(([kind, reading]) => reading === undefined
    ? `  ${kind}: -`
    : `  ${kind}: ${reading.value} @ ${new Date(reading.timestamp * 1000).toISOString()}`)
}
