import { describe, it, expect } from 'vitest'
import { decodePolyline, encodePolyline } from './polyline'

describe('polyline', () => {
  it('should decode the reference polyline at precision 5', () => {
    const points = decodePolyline('_p~iF~ps|U_ulLnnqC_mqNvxq`@', 5)

    expect(points).toHaveLength(3)
    expect(points[0].lat).toBeCloseTo(38.5, 6)
    expect(points[0].lon).toBeCloseTo(-120.2, 6)
    expect(points[1].lat).toBeCloseTo(40.7, 6)
    expect(points[1].lon).toBeCloseTo(-120.95, 6)
    expect(points[2].lat).toBeCloseTo(43.252, 6)
    expect(points[2].lon).toBeCloseTo(-126.453, 6)
  })

  it('should encode the reference polyline at precision 5', () => {
    const encoded = encodePolyline(
      [
        { lon: -120.2, lat: 38.5 },
        { lon: -120.95, lat: 40.7 },
        { lon: -126.453, lat: 43.252 },
      ],
      5,
    )

    expect(encoded).toBe('_p~iF~ps|U_ulLnnqC_mqNvxq`@')
  })

  it('should reproduce coordinates within 1e-6 after an encode/decode round trip', () => {
    const original = [
      { lon: -3.70379, lat: 40.416775 },
      { lon: -3.7, lat: 40.42 },
      { lon: 2.173404, lat: 41.385064 },
      { lon: -73.985656, lat: 40.748433 },
    ]

    const decoded = decodePolyline(encodePolyline(original))

    expect(decoded).toHaveLength(original.length)
    decoded.forEach((point, index) => {
      expect(Math.abs(point.lon - original[index].lon)).toBeLessThanOrEqual(1e-6)
      expect(Math.abs(point.lat - original[index].lat)).toBeLessThanOrEqual(1e-6)
    })
  })

  it('should return an empty list for an empty string', () => {
    expect(decodePolyline('')).toEqual([])
  })

  it('should throw on a truncated polyline', () => {
    expect(() => decodePolyline('_p~iF')).toThrow(RangeError)
  })
})
