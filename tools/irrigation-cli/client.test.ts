/**
 * Tests for the irrigation API client
 */

import { IrrigationApiClient } from './client'

import type { ZoneStatus } from './types'

const ZONE: ZoneStatus = {
  id: 'front',
  name: 'Front lawn',
  valveEntity: 'switch.front_valve',
  precipitationRate: 10,
  cropCoefficient: 1,
  balanceMm: -5,
  lastEtDate: '2024-06-15',
  requiredRuntimeSec: 1800,
  plan: {
    canRun: true,
    reason: 'Ready to run',
    effectiveDeficitMm: 5,
    forecastRainMm: 0,
    requiredRuntimeSec: 1800,
    clampedRuntimeSec: 1800,
  },
  runtimeTodaySec: 0,
  valveOpen: false,
  lastOffAt: null,
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

describe('IrrigationApiClient', () => {
  const fetchMock = vi.fn<typeof fetch>()

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('should send the token as a bearer header', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ zones: [ZONE] }))
    const client = new IrrigationApiClient({ baseUrl: 'http://localhost:8080/', token: 'test-secret' })

    const zones = await client.listZones()

    expect(zones).toEqual([ZONE])
    expect(fetchMock).toHaveBeenCalledTimes(1)
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('http://localhost:8080/api/zones')
    expect(init?.method).toBe('GET')
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    })
    expect(init?.body).toBeUndefined()
  })

  it('should omit the header without a token', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ zones: [] }))
    const client = new IrrigationApiClient({ baseUrl: 'http://localhost:8080' })

    await client.listZones()

    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ 'Content-Type': 'application/json' })
  })

  it('should PUT a balance override', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ ...ZONE, balanceMm: -12.5 }))
    const client = new IrrigationApiClient({ baseUrl: 'http://localhost:8080' })

    const zone = await client.setBalance('front', -12.5)

    expect(zone.balanceMm).toBe(-12.5)
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('http://localhost:8080/api/zones/front/balance')
    expect(init?.method).toBe('PUT')
    expect(init?.body).toBe('{"balanceMm":-12.5}')
  })

  it('should POST the ET options', async () => {
    const report = {
      date: '2024-06-15',
      method: 'hargreaves',
      et0Mm: 5.94,
      zones: [{ zoneId: 'front', etcMm: 5.94, outcome: 'applied' }],
      skippedReason: null,
      computedAt: 1718496000,
    }
    fetchMock.mockResolvedValue(jsonResponse(report))
    const client = new IrrigationApiClient({ baseUrl: 'http://localhost:8080' })

    const result = await client.calculateEt({ zoneId: 'front', force: true })

    expect(result).toEqual(report)
    expect(fetchMock.mock.calls[0][1]?.body).toBe('{"zoneId":"front","force":true}')
  })

  it('should surface the server error message', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: 'Unknown zone: orchard' }, 404))
    const client = new IrrigationApiClient({ baseUrl: 'http://localhost:8080' })

    await expect(client.getZone('orchard')).rejects.toThrow('HTTP 404: Unknown zone: orchard')
  })

  it('should reject a body of the wrong shape', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ status: 'ok' }))
    const client = new IrrigationApiClient({ baseUrl: 'http://localhost:8080' })

    await expect(client.getWeather()).rejects.toThrow('Unexpected response from /api/weather')
  })

  it('should report a timeout when the request is aborted', async () => {
    fetchMock.mockRejectedValue(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }))
    const client = new IrrigationApiClient({ baseUrl: 'http://localhost:8080', timeout: 2500 })

    await expect(client.listZones()).rejects.toThrow('Request timeout after 2500ms')
  })
})
