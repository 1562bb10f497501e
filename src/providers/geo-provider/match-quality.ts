import { GeoPrecision, MatchType } from './geo-provider.interface'

/**
 * HERE `matchType` → precision. Anything else is treated as interpolated.
 */
export const PRECISION_BY_MATCH_TYPE: Readonly<Record<string, GeoPrecision>> = {
  pointAddress: GeoPrecision.PRECISE,
  interpolated: GeoPrecision.INTERPOLATED,
}

/**
 * HERE `matchLevel` → canonical match type.
 */
export const MATCH_TYPE_BY_MATCH_LEVEL: Readonly<Record<string, MatchType>> = {
  landmark: MatchType.POINT_OF_INTEREST,
  country: MatchType.COUNTRY,
  state: MatchType.STATE,
  county: MatchType.COUNTY,
  city: MatchType.LOCALITY,
  district: MatchType.DISTRICT,
  street: MatchType.STREET,
  intersection: MatchType.INTERSECTION,
  houseNumber: MatchType.STREET_NUMBER,
  postalCode: MatchType.POSTAL_CODE,
}

/**
 * HERE Geocoding & Search v7 `resultType` → canonical match type.
 */
export const MATCH_TYPE_BY_RESULT_TYPE: Readonly<Record<string, MatchType>> = {
  place: MatchType.POINT_OF_INTEREST,
  administrativeArea: MatchType.STATE,
  locality: MatchType.LOCALITY,
  street: MatchType.STREET,
  intersection: MatchType.INTERSECTION,
  houseNumber: MatchType.STREET_NUMBER,
  postalCodePoint: MatchType.POSTAL_CODE,
}

export function precisionFromMatchType(matchType: string | undefined): GeoPrecision {
  if (matchType === undefined || !Object.hasOwn(PRECISION_BY_MATCH_TYPE, matchType)) {
    return GeoPrecision.INTERPOLATED
  }

  return PRECISION_BY_MATCH_TYPE[matchType]
}

export function matchTypesFromMatchLevel(matchLevel: string | undefined): MatchType[] {
  if (matchLevel === undefined || !Object.hasOwn(MATCH_TYPE_BY_MATCH_LEVEL, matchLevel)) {
    return []
  }

  return [MATCH_TYPE_BY_MATCH_LEVEL[matchLevel]]
}

export function matchTypesFromResultType(resultType: string | undefined): MatchType[] {
  if (resultType === undefined || !Object.hasOwn(MATCH_TYPE_BY_RESULT_TYPE, resultType)) {
    return []
  }

  return [MATCH_TYPE_BY_RESULT_TYPE[resultType]]
}

export function clampRelevance(value: number): number {
  return Math.min(1, Math.max(0, value))
}
