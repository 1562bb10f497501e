export const messages = {
  validation: {
    invalidSearchRequest: 'Invalid geocoding search request.',
    duplicateSearchId: 'Search identifiers must be unique within a batch.',
    batchTooLarge: 'Batch exceeds the maximum number of searches accepted by the provider.',
    invalidRouteMode: 'is not an accepted mode type',
    invalidWaypoints: 'A route needs at least two waypoints.',
    invalidRouteOption: 'Route options must be written as key=value.',
  },
  errors: {
    bulkGeocoderService: 'Error sending HERE batch',
    bulkGeocoderStatus: 'Error checking HERE batch job status',
    bulkGeocoderDownload: 'Error downloading HERE batch results',
    bulkGeocoderStalled: 'Too many retries for job',
    malformedResult: 'Malformed result received from the geolocation service.',
    routingService: 'Error trying to calculate route',
    missingCredentials: 'No credentials configured for the requested geolocation service.',
  },
  results: {
    bulkGeocoderFailed: 'Bulk geocoder failed',
    bulkGeocoderMissing: 'No result returned by bulk geocoder',
    serialGeocoderFailed: 'Error geocoding',
  },
}
