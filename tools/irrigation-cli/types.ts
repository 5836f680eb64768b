/**
 * API response shapes used by the CLI
 */

import type { ZoneStatus, WeatherStatus } from '@system/control'
import type { EtReport } from '@system/state'

export type { ZoneStatus, WeatherStatus, EtReport }

export interface ZoneList {
  zones: ZoneStatus[]
}

export interface CalculateEtOptions {
  zoneId?: string
  date?: string
  force?: boolean
}
