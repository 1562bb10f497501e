import { messages } from '@constants/messages'
import { logError } from '@lib/logger/helpers'
import {
  errorResult,
  GeocodeResult,
  GeocodingProvider,
  matchedResult,
  noMatchResult,
  SearchRequest,
} from '@providers/geo-provider/geo-provider.interface'

/**
 * Geocodes searches one request at a time. A failing item becomes an error
 * result for its id and never stops the remaining items.
 */
export class SerialGeocodeExecutor {
  constructor(private readonly geocoder: GeocodingProvider) {}

  async execute(searches: readonly SearchRequest[]): Promise<GeocodeResult[]> {
    const results: GeocodeResult[] = []

    for (const search of searches) {
      results.push(await this.geocodeOne(search))
    }

    return results
  }

  private async geocodeOne(search: SearchRequest): Promise<GeocodeResult> {
    try {
      const match = await this.geocoder.geocode({
        searchText: search.address,
        city: search.city,
        state: search.state,
        country: search.country,
      })

      return match ? matchedResult(search.id, match) : noMatchResult(search.id)
    } catch (error) {
      logError(error, { searchId: search.id }, 'Error geocoding')
      return errorResult(search.id, messages.results.serialGeocoderFailed)
    }
  }
}
