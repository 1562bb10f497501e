import { env } from '@env/index'
import { HereBulkGeocoder } from '@providers/bulk-geocoder/here-bulk-geocoder'
import { ApiKeyCredentials } from '@providers/credentials/api-key-credentials'
import { AppCodeCredentials } from '@providers/credentials/app-code-credentials'
import { HereGeocoderProvider } from '@providers/geo-provider/here-geocoder-provider'
import { HereSearchGeocoderProvider } from '@providers/geo-provider/here-search-geocoder-provider'
import { BulkGeocodeUseCase } from '@use-cases/geocoding/bulk-geocode-use-case'

/**
 * `v6`: HERE 6.2 APIs with app_id/app_code. `v7`: API key based endpoints.
 */
export type HereGeneration = 'v6' | 'v7'

export function makeHereBulkGeocoder(generation: HereGeneration = 'v7') {
  const transport = {
    maxRetries: env.HTTP_MAX_RETRIES,
    connectTimeoutMs: env.HTTP_CONNECT_TIMEOUT_MS,
    readTimeoutMs: env.HTTP_READ_TIMEOUT_MS,
  }

  const tuning = {
    minBatchedSearch: env.HERE_BATCH_MIN_SEARCHES,
    maxStalledRetries: env.HERE_BATCH_MAX_STALLED_RETRIES,
    pollIntervalMs: env.HERE_BATCH_POLL_INTERVAL_MS,
  }

  if (generation === 'v6') {
    const credentials = new AppCodeCredentials({ appId: env.HERE_APP_ID, appCode: env.HERE_APP_CODE })

    return new HereBulkGeocoder({
      batchUrl: env.HERE_BATCH_URL,
      credentials,
      serialGeocoder: new HereGeocoderProvider({ apiUrl: env.HERE_GEOCODER_URL, credentials, ...transport }),
      ...tuning,
      ...transport,
    })
  }

  return new HereBulkGeocoder({
    batchUrl: env.HERE_BATCH_V7_URL,
    credentials: new ApiKeyCredentials(env.HERE_API_KEY),
    serialGeocoder: new HereSearchGeocoderProvider({
      apiUrl: env.HERE_GEOCODER_V7_URL,
      credentials: new ApiKeyCredentials(env.HERE_API_KEY, 'apiKey'),
      ...transport,
    }),
    ...tuning,
    ...transport,
  })
}

export function makeBulkGeocodeUseCase(generation: HereGeneration = 'v7') {
  const bulkGeocodeUseCase = new BulkGeocodeUseCase(makeHereBulkGeocoder(generation))

  return bulkGeocodeUseCase
}
