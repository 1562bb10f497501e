import { logger } from '@lib/logger'
import { BulkGeocoder } from '@providers/bulk-geocoder/bulk-geocoder.interface'
import { GeocodeResult } from '@providers/geo-provider/geo-provider.interface'
import { InvalidSearchRequestError } from '@use-cases/errors/invalid-search-request-error'
import { searchRequestListSchema, SearchRequestInput } from './search-request-schema'

interface BulkGeocodeRequest {
  searches: SearchRequestInput[]
}

interface BulkGeocodeResponse {
  results: GeocodeResult[]
  matched: number
  failed: number
}

export class BulkGeocodeUseCase {
  constructor(private readonly bulkGeocoder: BulkGeocoder) {}

  async execute({ searches }: BulkGeocodeRequest): Promise<BulkGeocodeResponse> {
    const parsed = searchRequestListSchema.safeParse(searches)

    if (!parsed.success) {
      throw new InvalidSearchRequestError(
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      )
    }

    const results = await this.bulkGeocoder.bulkGeocode(parsed.data)

    const matched = results.filter((result) => result.coordinates !== null).length
    const failed = results.filter((result) => result.error !== null).length

    logger.info({ total: results.length, matched, failed }, 'Bulk geocoding finished')

    return { results, matched, failed }
  }
}
