import { describe, it, expect } from 'vitest'
import { HereBulkGeocoder } from '@providers/bulk-geocoder/here-bulk-geocoder'
import { BulkGeocodeUseCase } from '@use-cases/geocoding/bulk-geocode-use-case'
import { makeBulkGeocodeUseCase, makeHereBulkGeocoder } from './make-bulk-geocode-use-case'

describe('makeHereBulkGeocoder', () => {
  it('should build a geocoder for both HERE generations', () => {
    expect(makeHereBulkGeocoder('v6')).toBeInstanceOf(HereBulkGeocoder)
    expect(makeHereBulkGeocoder('v7')).toBeInstanceOf(HereBulkGeocoder)
  })

  it('should wrap the geocoder in the use case', () => {
    expect(makeBulkGeocodeUseCase()).toBeInstanceOf(BulkGeocodeUseCase)
  })
})
