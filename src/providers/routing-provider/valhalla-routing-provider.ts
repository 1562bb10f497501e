import { AxiosInstance, isAxiosError } from 'axios'
import { z } from 'zod'
import { decodePolyline } from '@lib/geo/polyline'
import { GeoPoint } from '@lib/geo/types'
import { createHttpClient } from '@lib/http/axios'
import { withRetry } from '@lib/http/retry'
import { logger } from '@lib/logger'
import { logError } from '@lib/logger/helpers'
import { Sleeper } from '@lib/time/sleep'
import { MalformedResultError } from '@use-cases/errors/malformed-result-error'
import { InvalidRouteModeError } from './error/invalid-route-mode-error'
import { InvalidRouteOptionError } from './error/invalid-route-option-error'
import { InvalidWaypointsError } from './error/invalid-waypoints-error'
import { RoutingServiceError } from './error/routing-service-error'
import { DistanceUnits, RouteResult, RoutingProvider, TravelMode } from './routing-provider.interface'

export interface ValhallaRoutingConfig {
  apiUrl: string
  apiKey?: string
  maxRetries?: number
  connectTimeoutMs?: number
  readTimeoutMs?: number
  http?: AxiosInstance
  sleep?: Sleeper
}

export const COSTING_BY_MODE: Readonly<Record<TravelMode, string>> = {
  [TravelMode.WALK]: 'pedestrian',
  [TravelMode.CAR]: 'auto',
  [TravelMode.PUBLIC_TRANSPORT]: 'bus',
  [TravelMode.BICYCLE]: 'bicycle',
}

export const AUTO_SHORTEST_COSTING = 'auto_shortest'

type LocationType = 'break' | 'through'

export interface RouteLocation {
  lon: number
  lat: number
  type: LocationType
}

export interface ValhallaRouteRequest {
  locations: RouteLocation[]
  costing: string
  directions_options: {
    units: DistanceUnits
    narrative: boolean
  }
}

const routeResponseSchema = z.object({
  trip: z.object({
    legs: z.array(
      z.object({
        shape: z.string(),
        summary: z.object({
          length: z.number(),
          time: z.number(),
        }),
      }),
    ),
  }),
})

const TRAVEL_MODES: readonly string[] = Object.values(TravelMode)

function isTravelMode(mode: string): mode is TravelMode {
  return TRAVEL_MODES.includes(mode)
}

export function parseRouteOptions(options: readonly string[]): Record<string, string> {
  const parsed: Record<string, string> = {}

  for (const option of options) {
    const separator = option.indexOf('=')
    if (separator <= 0) {
      throw new InvalidRouteOptionError(option)
    }
    parsed[option.slice(0, separator)] = option.slice(separator + 1)
  }

  return parsed
}

/**
 * Costing profile for a mode. `mode_type=shortest` only applies to cars.
 */
export function resolveCosting(mode: string, options: Record<string, string>): string {
  if (!isTravelMode(mode)) {
    throw new InvalidRouteModeError(mode)
  }

  if (mode === TravelMode.CAR && options.mode_type === 'shortest') {
    return AUTO_SHORTEST_COSTING
  }

  return COSTING_BY_MODE[mode]
}

/**
 * First and last waypoints are stops; the ones between are passed through.
 */
export function toRouteLocations(waypoints: readonly GeoPoint[]): RouteLocation[] {
  if (waypoints.length < 2) {
    throw new InvalidWaypointsError(waypoints.length)
  }

  const lastIndex = waypoints.length - 1

  return waypoints.map((point, index) => ({
    lon: point.lon,
    lat: point.lat,
    type: index === 0 || index === lastIndex ? 'break' : 'through',
  }))
}

export function buildRouteRequest(
  waypoints: readonly GeoPoint[],
  mode: string,
  options: readonly string[] = [],
  units: DistanceUnits = DistanceUnits.KILOMETERS,
): ValhallaRouteRequest {
  const costing = resolveCosting(mode, parseRouteOptions(options))

  return {
    locations: toRouteLocations(waypoints),
    costing,
    directions_options: { units, narrative: false },
  }
}

/**
 * Point-to-point routing against a Valhalla compatible `/route` endpoint.
 */
export class ValhallaRoutingProvider implements RoutingProvider {
  private readonly api: AxiosInstance

  private readonly DEFAULT_MAX_RETRIES = 1

  constructor(private readonly config: ValhallaRoutingConfig) {
    this.api =
      config.http ??
      createHttpClient({
        timeout: config.readTimeoutMs,
        connectTimeoutMs: config.connectTimeoutMs,
      })
  }

  async calculateRoutePointToPoint(
    waypoints: readonly GeoPoint[],
    mode: string,
    options: readonly string[] = [],
    units: DistanceUnits = DistanceUnits.KILOMETERS,
  ): Promise<RouteResult | null> {
    // Throws before any request for unsupported input
    const request = buildRouteRequest(waypoints, mode, options, units)

    let body: unknown

    try {
      const response = await withRetry(
        () =>
          this.api.get<unknown>(this.config.apiUrl, {
            params: {
              json: JSON.stringify(request),
              ...(this.config.apiKey ? { api_key: this.config.apiKey } : {}),
            },
          }),
        {
          maxRetries: this.config.maxRetries ?? this.DEFAULT_MAX_RETRIES,
          sleep: this.config.sleep,
          operation: 'valhalla-route',
        },
      )
      body = response.data
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 400) {
        logger.info({ mode, waypoints: waypoints.length }, 'Routing service found no route')
        return null
      }

      logError(error, { mode, options, waypoints: waypoints.length }, 'Error trying to calculate route')

      throw new RoutingServiceError(
        isAxiosError(error) ? { status: error.response?.status, body: error.response?.data } : {},
        error,
      )
    }

    return this.parseRoute(body)
  }

  private parseRoute(body: unknown): RouteResult | null {
    const parsed = routeResponseSchema.safeParse(body)

    if (!parsed.success) {
      throw new MalformedResultError('Routing response without trip legs.', parsed.error)
    }

    const leg = parsed.data.trip.legs[0]

    if (!leg) {
      return null
    }

    let shape: GeoPoint[]
    try {
      shape = decodePolyline(leg.shape)
    } catch (error) {
      throw new MalformedResultError('Routing response with an invalid shape.', error)
    }

    return {
      shape,
      length: leg.summary.length,
      duration: leg.summary.time,
    }
  }
}
