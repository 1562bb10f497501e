import { describe, it, expect, vi, beforeEach } from 'vitest'
import { BulkGeocoder, GeocodeStrategy } from '@providers/bulk-geocoder/bulk-geocoder.interface'
import { errorResult, GeoPrecision, MatchType, matchedResult, noMatchResult } from '@providers/geo-provider/geo-provider.interface'
import { InvalidSearchRequestError } from '@use-cases/errors/invalid-search-request-error'
import { BulkGeocodeUseCase } from './bulk-geocode-use-case'

describe('BulkGeocodeUseCase', () => {
  let bulkGeocode: ReturnType<typeof vi.fn>
  let sut: BulkGeocodeUseCase

  beforeEach(() => {
    bulkGeocode = vi.fn()
    const bulkGeocoder: BulkGeocoder = {
      decide: () => GeocodeStrategy.SERIAL,
      bulkGeocode,
    }
    sut = new BulkGeocodeUseCase(bulkGeocoder)
  })

  it('should normalize the searches before geocoding them', async () => {
    bulkGeocode.mockResolvedValue([])

    await sut.execute({
      searches: [
        { id: 42, address: '  Calle Mayor 1 ', city: 'Madrid', country: '   ' },
        { id: 'b', state: null },
      ],
    })

    expect(bulkGeocode).toHaveBeenCalledWith([
      { id: '42', address: 'Calle Mayor 1', city: 'Madrid' },
      { id: 'b' },
    ])
  })

  it('should count matched and failed results', async () => {
    bulkGeocode.mockResolvedValue([
      matchedResult('1', {
        coordinates: { lon: -3.7, lat: 40.4 },
        metadata: { relevance: 0.9, precision: GeoPrecision.PRECISE, matchTypes: [MatchType.STREET_NUMBER] },
      }),
      noMatchResult('2'),
      errorResult('3', 'Error geocoding'),
    ])

    const response = await sut.execute({ searches: [{ id: '1' }, { id: '2' }, { id: '3' }] })

    expect(response.results).toHaveLength(3)
    expect(response.matched).toBe(1)
    expect(response.failed).toBe(1)
  })

  it('should reject searches without a usable id', async () => {
    await expect(sut.execute({ searches: [{ id: '' }] })).rejects.toBeInstanceOf(InvalidSearchRequestError)
    expect(bulkGeocode).not.toHaveBeenCalled()
  })
})
