import { describe, it, expect, vi, beforeEach } from 'vitest'
import { encodePolyline } from '@lib/geo/polyline'
import { MalformedResultError } from '@use-cases/errors/malformed-result-error'
import { createFakeHttp, httpError } from '../../tests/fakes/http'
import { InvalidRouteModeError } from './error/invalid-route-mode-error'
import { InvalidRouteOptionError } from './error/invalid-route-option-error'
import { InvalidWaypointsError } from './error/invalid-waypoints-error'
import { RoutingServiceError } from './error/routing-service-error'
import { DistanceUnits } from './routing-provider.interface'
import { buildRouteRequest, ValhallaRoutingProvider } from './valhalla-routing-provider'

const madrid = { lon: -3.7038, lat: 40.4168 }
const toledo = { lon: -4.0273, lat: 39.8628 }
const aranjuez = { lon: -3.6021, lat: 40.0311 }
const getafe = { lon: -3.7325, lat: 40.3057 }

describe('buildRouteRequest', () => {
  it('should mark both waypoints of a two point route as stops', () => {
    const request = buildRouteRequest([madrid, toledo], 'car')

    expect(request.locations.map((location) => location.type)).toEqual(['break', 'break'])
  })

  it('should pass through the intermediate waypoints', () => {
    const request = buildRouteRequest([madrid, getafe, aranjuez, toledo], 'walk')

    expect(request.locations.map((location) => location.type)).toEqual(['break', 'through', 'through', 'break'])
    expect(request.locations[1]).toEqual({ lon: -3.7325, lat: 40.3057, type: 'through' })
  })

  it('should pick auto_shortest for cars with mode_type=shortest', () => {
    expect(buildRouteRequest([madrid, toledo], 'car', ['mode_type=shortest']).costing).toBe('auto_shortest')
  })

  it('should pick the default costing for each mode', () => {
    expect(buildRouteRequest([madrid, toledo], 'car').costing).toBe('auto')
    expect(buildRouteRequest([madrid, toledo], 'walk').costing).toBe('pedestrian')
    expect(buildRouteRequest([madrid, toledo], 'public_transport').costing).toBe('bus')
    expect(buildRouteRequest([madrid, toledo], 'bicycle').costing).toBe('bicycle')
  })

  it('should ignore mode_type=shortest for modes other than car', () => {
    expect(buildRouteRequest([madrid, toledo], 'walk', ['mode_type=shortest']).costing).toBe('pedestrian')
  })

  it('should set units and disable the narrative', () => {
    expect(buildRouteRequest([madrid, toledo], 'car', [], DistanceUnits.MILES).directions_options).toEqual({
      units: 'miles',
      narrative: false,
    })
  })

  it('should reject unknown modes, short waypoint lists and malformed options', () => {
    expect(() => buildRouteRequest([madrid, toledo], 'plane')).toThrow(InvalidRouteModeError)
    expect(() => buildRouteRequest([madrid], 'car')).toThrow(InvalidWaypointsError)
    expect(() => buildRouteRequest([madrid, toledo], 'car', ['shortest'])).toThrow(InvalidRouteOptionError)
  })
})

describe('ValhallaRoutingProvider', () => {
  let http: ReturnType<typeof createFakeHttp>
  let provider: ValhallaRoutingProvider

  beforeEach(() => {
    http = createFakeHttp()
    provider = new ValhallaRoutingProvider({
      apiUrl: 'https://routing.example.com/route',
      apiKey: 'test-routing-key',
      maxRetries: 0,
      http: http.instance,
      sleep: vi.fn().mockResolvedValue(undefined),
    })
  })

  it('should decode the first leg of the trip', async () => {
    http.get.mockResolvedValue({
      status: 200,
      data: {
        trip: {
          legs: [{ shape: encodePolyline([madrid, getafe, toledo]), summary: { length: 72.4, time: 3960 } }],
        },
      },
    })

    const route = await provider.calculateRoutePointToPoint([madrid, toledo], 'car')

    expect(route?.length).toBe(72.4)
    expect(route?.duration).toBe(3960)
    expect(route?.shape).toHaveLength(3)
    expect(route?.shape[1].lon).toBeCloseTo(-3.7325, 6)
    expect(route?.shape[1].lat).toBeCloseTo(40.3057, 6)
  })

  it('should send the request document as json with the api key', async () => {
    http.get.mockResolvedValue({ status: 200, data: { trip: { legs: [] } } })

    await provider.calculateRoutePointToPoint([madrid, toledo], 'car', ['mode_type=shortest'])

    expect(http.get).toHaveBeenCalledWith('https://routing.example.com/route', {
      params: {
        json: JSON.stringify({
          locations: [
            { lon: -3.7038, lat: 40.4168, type: 'break' },
            { lon: -4.0273, lat: 39.8628, type: 'break' },
          ],
          costing: 'auto_shortest',
          directions_options: { units: 'kilometers', narrative: false },
        }),
        api_key: 'test-routing-key',
      },
    })
  })

  it('should return null when the trip has no legs', async () => {
    http.get.mockResolvedValue({ status: 200, data: { trip: { legs: [] } } })

    await expect(provider.calculateRoutePointToPoint([madrid, toledo], 'walk')).resolves.toBeNull()
  })

  it('should return null on a bad request answer', async () => {
    http.get.mockRejectedValue(httpError(400, { error: 'No path could be found for input' }))

    await expect(provider.calculateRoutePointToPoint([madrid, toledo], 'bicycle')).resolves.toBeNull()
  })

  it('should raise a service error for other failures', async () => {
    http.get.mockRejectedValue(httpError(500, 'boom'))

    await expect(provider.calculateRoutePointToPoint([madrid, toledo], 'car')).rejects.toMatchObject({
      name: 'RoutingServiceError',
      response: { status: 500, body: 'boom' },
    })
    await expect(provider.calculateRoutePointToPoint([madrid, toledo], 'car')).rejects.toBeInstanceOf(
      RoutingServiceError,
    )
  })

  it('should raise MalformedResultError when the trip is missing', async () => {
    http.get.mockResolvedValue({ status: 200, data: { status: 'ok' } })

    await expect(provider.calculateRoutePointToPoint([madrid, toledo], 'car')).rejects.toBeInstanceOf(
      MalformedResultError,
    )
  })

  it('should reject an unknown mode before calling the service', async () => {
    await expect(provider.calculateRoutePointToPoint([madrid, toledo], 'teleport')).rejects.toBeInstanceOf(
      InvalidRouteModeError,
    )
    expect(http.get).not.toHaveBeenCalled()
  })
})
