import { GeoPoint } from '@lib/geo/types'

export enum GeoPrecision {
  PRECISE = 'precise',
  INTERPOLATED = 'interpolated',
}

export enum MatchType {
  POINT_OF_INTEREST = 'point_of_interest',
  COUNTRY = 'country',
  STATE = 'state',
  COUNTY = 'county',
  LOCALITY = 'locality',
  DISTRICT = 'district',
  STREET = 'street',
  INTERSECTION = 'intersection',
  STREET_NUMBER = 'street_number',
  POSTAL_CODE = 'postal_code',
}

export interface GeocodeMetadata {
  /** Provider confidence, always within [0, 1]. */
  relevance: number
  precision: GeoPrecision
  matchTypes: MatchType[]
}

/**
 * A single address to geocode. `id` is chosen by the caller and must be
 * unique inside one batch.
 */
export interface SearchRequest {
  readonly id: string
  readonly address?: string
  readonly city?: string
  readonly state?: string
  readonly country?: string
}

/**
 * Outcome for one SearchRequest:
 * - match: coordinates and metadata set
 * - no match: everything null
 * - failure: coordinates and metadata null, `error` set
 */
export interface GeocodeResult {
  readonly id: string
  readonly coordinates: GeoPoint | null
  readonly metadata: GeocodeMetadata | null
  readonly error: string | null
}

export interface GeocodeQuery {
  searchText?: string
  city?: string
  state?: string
  country?: string
}

export interface GeocodeMatch {
  coordinates: GeoPoint
  metadata: GeocodeMetadata
}

export interface GeocodingProvider {
  geocode(query: GeocodeQuery): Promise<GeocodeMatch | null>
}

export function matchedResult(id: string, match: GeocodeMatch): GeocodeResult {
  return { id, coordinates: match.coordinates, metadata: match.metadata, error: null }
}

export function noMatchResult(id: string): GeocodeResult {
  return { id, coordinates: null, metadata: null, error: null }
}

export function errorResult(id: string, error: string): GeocodeResult {
  return { id, coordinates: null, metadata: null, error }
}
