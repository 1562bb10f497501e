import { GeoPoint } from '@lib/geo/types'

export enum TravelMode {
  WALK = 'walk',
  CAR = 'car',
  PUBLIC_TRANSPORT = 'public_transport',
  BICYCLE = 'bicycle',
}

export enum DistanceUnits {
  KILOMETERS = 'kilometers',
  MILES = 'miles',
}

export interface RouteResult {
  shape: GeoPoint[]
  /** In the requested units. */
  length: number
  /** Seconds. */
  duration: number
}

export interface RoutingProvider {
  /**
   * Resolves to null when the service finds no route between the waypoints.
   */
  calculateRoutePointToPoint(
    waypoints: readonly GeoPoint[],
    mode: string,
    options?: readonly string[],
    units?: DistanceUnits,
  ): Promise<RouteResult | null>
}
