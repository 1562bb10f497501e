export interface GeoPoint {
  lon: number
  lat: number
}
