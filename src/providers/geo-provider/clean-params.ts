type RawParams = Record<string, string | number | undefined | null>

/**
 * Drops undefined, null and blank values and trims strings.
 */
export function cleanParams(params: RawParams): Record<string, string | number> {
  const cleaned: Record<string, string | number> = {}

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue
    if (typeof value === 'string' && value.trim().length === 0) continue
    cleaned[key] = typeof value === 'string' ? value.trim() : value
  }

  return cleaned
}
