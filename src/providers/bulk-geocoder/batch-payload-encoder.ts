import Papa from 'papaparse'
import { SearchRequest } from '@providers/geo-provider/geo-provider.interface'

export const BATCH_DELIMITER = '|'
export const BATCH_INPUT_COLUMNS = ['recId', 'searchText', 'country'] as const

const SEARCH_TEXT_SEPARATOR = ', '

function trimmed(value: string | undefined): string {
  return value?.trim() ?? ''
}

/**
 * Non-empty address, city and state, in that order, with surrounding blanks removed.
 */
export function composeSearchText(search: SearchRequest): string {
  return [search.address, search.city, search.state]
    .map(trimmed)
    .filter((field) => field.length > 0)
    .join(SEARCH_TEXT_SEPARATOR)
}

/**
 * Serializes searches into the pipe-delimited document accepted by the HERE
 * batch geocoder. Every row has exactly three columns; absent values are
 * written as empty fields. Address fields are trimmed, so only fields holding
 * the delimiter, quotes or line breaks end up quoted. Ids are written as given
 * since results are matched back to them verbatim.
 */
export function encodeBatchPayload(searches: readonly SearchRequest[]): string {
  const rows = searches.map((search) => [String(search.id), composeSearchText(search), trimmed(search.country)])

  return Papa.unparse(
    { fields: [...BATCH_INPUT_COLUMNS], data: rows },
    {
      delimiter: BATCH_DELIMITER,
      newline: '\r\n',
      quotes: false,
      header: true,
    },
  )
}
