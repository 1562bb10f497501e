import { messages } from '@constants/messages'
import { logger } from '@lib/logger'
import {
  errorResult,
  GeocodeResult,
  matchedResult,
  noMatchResult,
} from '@providers/geo-provider/geo-provider.interface'
import { clampRelevance, matchTypesFromMatchLevel, precisionFromMatchType } from '@providers/geo-provider/match-quality'

/**
 * Output columns requested from the batch geocoder. `recId`, `SeqNumber` and
 * `seqLength` are always prepended by the service.
 */
export const BATCH_OUTPUT_COLUMNS = [
  'displayLatitude',
  'displayLongitude',
  'relevance',
  'matchType',
  'matchCode',
  'matchLevel',
  'matchQualityStreet',
] as const

export const NO_MATCH_LEVEL = 'NOMATCH'
export const FAILED_MATCH_LEVEL = 'FAILED'
export const FIRST_CANDIDATE = '1'

export type BatchResultRow = Partial<Record<string, string>>

/**
 * Turns one output row into a result. Returns null for rows that carry no
 * result of their own: secondary candidates and unreadable first candidates.
 */
export function decodeBatchRow(row: BatchResultRow): GeocodeResult | null {
  const recId = row.recId

  if (!recId) {
    logger.warn({ row }, 'Batch result row without recId skipped')
    return null
  }

  if (row.matchLevel === NO_MATCH_LEVEL) {
    return noMatchResult(recId)
  }

  if (row.matchLevel === FAILED_MATCH_LEVEL) {
    return errorResult(recId, messages.results.bulkGeocoderFailed)
  }

  if (row.SeqNumber !== FIRST_CANDIDATE) {
    return null
  }

  const lon = Number.parseFloat(row.displayLongitude ?? '')
  const lat = Number.parseFloat(row.displayLatitude ?? '')
  const relevance = Number.parseFloat(row.relevance ?? '')

  if (!Number.isFinite(lon) || !Number.isFinite(lat) || !Number.isFinite(relevance)) {
    logger.warn({ recId, matchLevel: row.matchLevel }, 'Unreadable batch result row skipped')
    return null
  }

  return matchedResult(recId, {
    coordinates: { lon, lat },
    metadata: {
      relevance: clampRelevance(relevance),
      precision: precisionFromMatchType(row.matchType),
      matchTypes: matchTypesFromMatchLevel(row.matchLevel),
    },
  })
}
