import { GeoPoint } from './types'

export const DEFAULT_POLYLINE_PRECISION = 6

/**
 * Decodes an encoded polyline (Google algorithm) into lon/lat points.
 * Valhalla encodes shapes with 6 decimal digits, hence the default.
 */
export function decodePolyline(encoded: string, precision = DEFAULT_POLYLINE_PRECISION): GeoPoint[] {
  const factor = Math.pow(10, precision)
  const points: GeoPoint[] = []

  let index = 0
  let lat = 0
  let lon = 0

  const readDelta = (): number => {
    let shift = 0
    let result = 0
    let byte: number

    do {
      if (index >= encoded.length) {
        throw new RangeError(`Truncated polyline at offset ${index}`)
      }
      byte = encoded.charCodeAt(index++) - 63
      result |= (byte & 0x1f) << shift
      shift += 5
    } while (byte >= 0x20)

    return result & 1 ? ~(result >> 1) : result >> 1
  }

  while (index < encoded.length) {
    lat += readDelta()
    lon += readDelta()

    points.push({ lon: lon / factor, lat: lat / factor })
  }

  return points
}

function encodeSigned(value: number): string {
  let remaining = value < 0 ? ~(value << 1) : value << 1
  let output = ''

  while (remaining >= 0x20) {
    output += String.fromCharCode((0x20 | (remaining & 0x1f)) + 63)
    remaining >>= 5
  }

  return output + String.fromCharCode(remaining + 63)
}

export function encodePolyline(points: GeoPoint[], precision = DEFAULT_POLYLINE_PRECISION): string {
  const factor = Math.pow(10, precision)

  let previousLat = 0
  let previousLon = 0
  let output = ''

  for (const point of points) {
    const lat = Math.round(point.lat * factor)
    const lon = Math.round(point.lon * factor)

    output += encodeSigned(lat - previousLat) + encodeSigned(lon - previousLon)

    previousLat = lat
    previousLon = lon
  }

  return output
}
