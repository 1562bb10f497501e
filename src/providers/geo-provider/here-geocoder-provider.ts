import { AxiosInstance } from 'axios'
import { z } from 'zod'
import { createHttpClient } from '@lib/http/axios'
import { withRetry } from '@lib/http/retry'
import { logger } from '@lib/logger'
import { Sleeper } from '@lib/time/sleep'
import { CredentialsProvider } from '@providers/credentials/credentials-provider.interface'
import { MalformedResultError } from '@use-cases/errors/malformed-result-error'
import { GeocodeMatch, GeocodeQuery, GeocodingProvider } from './geo-provider.interface'
import { cleanParams } from './clean-params'
import { clampRelevance, matchTypesFromMatchLevel, precisionFromMatchType } from './match-quality'

export interface HereGeocoderConfig {
  apiUrl: string
  credentials: CredentialsProvider
  maxResults?: number
  maxRetries?: number
  connectTimeoutMs?: number
  readTimeoutMs?: number
  http?: AxiosInstance
  sleep?: Sleeper
}

const hereResultSchema = z.object({
  Relevance: z.number(),
  MatchLevel: z.string().optional(),
  MatchType: z.string().optional(),
  Location: z.object({
    DisplayPosition: z.object({
      Latitude: z.number(),
      Longitude: z.number(),
    }),
  }),
})

const hereGeocodeResponseSchema = z.object({
  Response: z.object({
    View: z.array(
      z.object({
        Result: z.array(hereResultSchema),
      }),
    ),
  }),
})

/**
 * HERE Geocoder API 6.2 (`geocode.json`), authenticated with app_id/app_code.
 */
export class HereGeocoderProvider implements GeocodingProvider {
  private readonly api: AxiosInstance

  private readonly GEN = 9
  private readonly DEFAULT_MAX_RESULTS = 1
  private readonly DEFAULT_MAX_RETRIES = 1

  constructor(private readonly config: HereGeocoderConfig) {
    this.api =
      config.http ??
      createHttpClient({
        baseURL: config.apiUrl,
        timeout: config.readTimeoutMs,
        connectTimeoutMs: config.connectTimeoutMs,
      })
  }

  async geocode(query: GeocodeQuery): Promise<GeocodeMatch | null> {
    const searchParams = cleanParams({
      searchtext: query.searchText,
      city: query.city,
      state: query.state,
      country: query.country,
    })

    if (Object.keys(searchParams).length === 0) {
      logger.warn('HERE geocoder called without any address field')
      return null
    }

    const response = await withRetry(
      () =>
        this.api.get<unknown>('/geocode.json', {
          params: {
            ...this.config.credentials.params(),
            ...searchParams,
            gen: this.GEN,
            maxresults: this.config.maxResults ?? this.DEFAULT_MAX_RESULTS,
          },
        }),
      {
        maxRetries: this.config.maxRetries ?? this.DEFAULT_MAX_RETRIES,
        sleep: this.config.sleep,
        operation: 'here-geocode',
      },
    )

    const parsed = hereGeocodeResponseSchema.safeParse(response.data)

    if (!parsed.success) {
      throw new MalformedResultError('Unexpected HERE geocoder response.', parsed.error)
    }

    const best = parsed.data.Response.View[0]?.Result[0]

    if (!best) {
      logger.debug({ query: searchParams }, 'HERE geocoder returned no match')
      return null
    }

    return {
      coordinates: {
        lon: best.Location.DisplayPosition.Longitude,
        lat: best.Location.DisplayPosition.Latitude,
      },
      metadata: {
        relevance: clampRelevance(best.Relevance),
        precision: precisionFromMatchType(best.MatchType),
        matchTypes: matchTypesFromMatchLevel(best.MatchLevel),
      },
    }
  }
}
