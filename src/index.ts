export * from '@providers/geo-provider/geo-provider.interface'
export * from '@providers/bulk-geocoder/bulk-geocoder.interface'
export { HereBulkGeocoder } from '@providers/bulk-geocoder/here-bulk-geocoder'
export type { HereBulkGeocoderConfig } from '@providers/bulk-geocoder/here-bulk-geocoder'
export { encodeBatchPayload } from '@providers/bulk-geocoder/batch-payload-encoder'
export { decodeBatchRow } from '@providers/bulk-geocoder/batch-result-codec'
export { readResultArchive } from '@providers/bulk-geocoder/batch-result-archive'
export { HereGeocoderProvider } from '@providers/geo-provider/here-geocoder-provider'
export { HereSearchGeocoderProvider } from '@providers/geo-provider/here-search-geocoder-provider'
export { AppCodeCredentials } from '@providers/credentials/app-code-credentials'
export { ApiKeyCredentials } from '@providers/credentials/api-key-credentials'
export type { CredentialsProvider } from '@providers/credentials/credentials-provider.interface'
export * from '@providers/routing-provider/routing-provider.interface'
export { ValhallaRoutingProvider } from '@providers/routing-provider/valhalla-routing-provider'
export { decodePolyline, encodePolyline } from '@lib/geo/polyline'
export type { GeoPoint } from '@lib/geo/types'
export { BulkGeocodeUseCase } from '@use-cases/geocoding/bulk-geocode-use-case'
export { CalculateRouteUseCase } from '@use-cases/routing/calculate-route-use-case'
export { makeBulkGeocodeUseCase, makeHereBulkGeocoder } from '@use-cases/factories/make-bulk-geocode-use-case'
export { makeCalculateRouteUseCase } from '@use-cases/factories/make-calculate-route-use-case'
export { StalledBatchJobError } from '@providers/bulk-geocoder/error/stalled-batch-job-error'
export { BulkGeocoderServiceError } from '@providers/bulk-geocoder/error/bulk-geocoder-service-error'
export { DuplicateSearchIdError } from '@providers/bulk-geocoder/error/duplicate-search-id-error'
export { BatchTooLargeError } from '@providers/bulk-geocoder/error/batch-too-large-error'
export { InvalidRouteModeError } from '@providers/routing-provider/error/invalid-route-mode-error'
export { InvalidWaypointsError } from '@providers/routing-provider/error/invalid-waypoints-error'
export { RoutingServiceError } from '@providers/routing-provider/error/routing-service-error'
export { MalformedResultError } from '@use-cases/errors/malformed-result-error'
