import { AxiosInstance } from 'axios'
import { z } from 'zod'
import { createHttpClient } from '@lib/http/axios'
import { withRetry } from '@lib/http/retry'
import { logger } from '@lib/logger'
import { Sleeper } from '@lib/time/sleep'
import { CredentialsProvider } from '@providers/credentials/credentials-provider.interface'
import { MalformedResultError } from '@use-cases/errors/malformed-result-error'
import { GeocodeMatch, GeocodeQuery, GeocodingProvider, GeoPrecision } from './geo-provider.interface'
import { cleanParams } from './clean-params'
import { clampRelevance, matchTypesFromResultType } from './match-quality'

export interface HereSearchGeocoderConfig {
  apiUrl: string
  credentials: CredentialsProvider
  limit?: number
  maxRetries?: number
  connectTimeoutMs?: number
  readTimeoutMs?: number
  http?: AxiosInstance
  sleep?: Sleeper
}

const searchItemSchema = z.object({
  position: z.object({ lat: z.number(), lng: z.number() }),
  resultType: z.string().optional(),
  houseNumberType: z.string().optional(),
  scoring: z.object({ queryScore: z.number() }).optional(),
})

const searchResponseSchema = z.object({
  items: z.array(searchItemSchema),
})

// Point address, as opposed to an interpolated house number
const POINT_ADDRESS = 'PA'

/**
 * HERE Geocoding & Search API v7, authenticated with an API key.
 * Free text goes in `q`, structured fields in `qq`.
 */
export class HereSearchGeocoderProvider implements GeocodingProvider {
  private readonly api: AxiosInstance

  private readonly DEFAULT_LIMIT = 1
  private readonly DEFAULT_MAX_RETRIES = 1

  constructor(private readonly config: HereSearchGeocoderConfig) {
    this.api =
      config.http ??
      createHttpClient({
        baseURL: config.apiUrl,
        timeout: config.readTimeoutMs,
        connectTimeoutMs: config.connectTimeoutMs,
      })
  }

  async geocode(query: GeocodeQuery): Promise<GeocodeMatch | null> {
    const qualified = Object.entries(cleanParams({ city: query.city, state: query.state, country: query.country }))
      .map(([key, value]) => `${key}=${value}`)
      .join(';')

    const searchParams = cleanParams({ q: query.searchText, qq: qualified })

    if (Object.keys(searchParams).length === 0) {
      logger.warn('HERE search geocoder called without any address field')
      return null
    }

    const response = await withRetry(
      () =>
        this.api.get<unknown>('/geocode', {
          params: {
            ...this.config.credentials.params(),
            ...searchParams,
            limit: this.config.limit ?? this.DEFAULT_LIMIT,
          },
        }),
      {
        maxRetries: this.config.maxRetries ?? this.DEFAULT_MAX_RETRIES,
        sleep: this.config.sleep,
        operation: 'here-search-geocode',
      },
    )

    const parsed = searchResponseSchema.safeParse(response.data)

    if (!parsed.success) {
      throw new MalformedResultError('Unexpected HERE search response.', parsed.error)
    }

    const best = parsed.data.items[0]

    if (!best) {
      logger.debug({ query: searchParams }, 'HERE search geocoder returned no match')
      return null
    }

    return {
      coordinates: { lon: best.position.lng, lat: best.position.lat },
      metadata: {
        relevance: clampRelevance(best.scoring?.queryScore ?? 0),
        precision: best.houseNumberType === POINT_ADDRESS ? GeoPrecision.PRECISE : GeoPrecision.INTERPOLATED,
        matchTypes: matchTypesFromResultType(best.resultType),
      },
    }
  }
}
