/**
 * Irrigation API client
 * Typed wrapper around the service's HTTP API
 */

import type {
  CalculateEtOptions,
  EtReport,
  WeatherStatus,
  ZoneList,
  ZoneStatus,
} from './types'

export interface IrrigationClientConfig {
  baseUrl: string
  token?: string
  timeout?: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isZoneStatus(value: unknown): value is ZoneStatus {
  return isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.balanceMm === 'number' &&
    isRecord(value.plan)
}

function isZoneList(value: unknown): value is ZoneList {
  return isRecord(value) && Array.isArray(value.zones) && value.zones.every(isZoneStatus)
}

function isEtReport(value: unknown): value is EtReport {
  return isRecord(value) && typeof value.date === 'string' && Array.isArray(value.zones)
}

function isWeatherStatus(value: unknown): value is WeatherStatus {
  return isRecord(value) && isRecord(value.latest) && 'lastEtReport' in value
}

export class IrrigationApiClient {
  private baseUrl: string
  private timeout: number
  private authHeader?: string

  constructor(config: IrrigationClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '')
    this.timeout = config.timeout || 10000

    if (config.token) {
      this.authHeader = `Bearer ${config.token}`
    }
  }

  /**
   * Send a request and return the parsed JSON body
   */
  private async sendRequest(method: string, path: string, body?: object): Promise<unknown> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeout)

    try {
      const response = await fetch(this.baseUrl + path, {
        method,
        headers: {
          'Content-Type': 'application/json',
          ...(this.authHeader && { Authorization: this.authHeader }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      })

      clearTimeout(timeoutId)

      const text = await response.text()
      const data: unknown = text === '' ? null : JSON.parse(text)

      if (!response.ok) {
        const detail = isRecord(data) && typeof data.error === 'string' ? data.error : response.statusText
        throw new Error(`HTTP ${response.status}: ${detail}`)
      }

      return data
    } catch (error: unknown) {
      clearTimeout(timeoutId)

      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request timeout after ${this.timeout}ms`)
      }
      throw error
    }
  }

  private unexpected(path: string): Error {
    return new Error(`Unexpected response from ${path}`)
  }

  /**
   * Zone methods
   */

  async listZones(): Promise<ZoneStatus[]> {
    const data = await this.sendRequest('GET', '/api/zones')
    if (!isZoneList(data)) throw this.unexpected('/api/zones')
    return data.zones
  }

  async getZone(zoneId: string): Promise<ZoneStatus> {
    const path = `/api/zones/${encodeURIComponent(zoneId)}`
    const data = await this.sendRequest('GET', path)
    if (!isZoneStatus(data)) throw this.unexpected(path)
    return data
  }

  async setBalance(zoneId: string, balanceMm: number): Promise<ZoneStatus> {
    const path = `/api/zones/${encodeURIComponent(zoneId)}/balance`
    const data = await this.sendRequest('PUT', path, { balanceMm })
    if (!isZoneStatus(data)) throw this.unexpected(path)
    return data
  }

  /**
   * ET and weather methods
   */

  async calculateEt(options: CalculateEtOptions = {}): Promise<EtReport> {
    const data = await this.sendRequest('POST', '/api/et/calculate', options)
    if (!isEtReport(data)) throw this.unexpected('/api/et/calculate')
    return data
  }

  async getWeather(): Promise<WeatherStatus> {
    const data = await this.sendRequest('GET', '/api/weather')
    if (!isWeatherStatus(data)) throw this.unexpected('/api/weather')
    return data
  }
}
