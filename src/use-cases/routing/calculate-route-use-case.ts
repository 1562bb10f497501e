import { GeoPoint } from '@lib/geo/types'
import { DistanceUnits, RouteResult, RoutingProvider } from '@providers/routing-provider/routing-provider.interface'

interface CalculateRouteRequest {
  waypoints: GeoPoint[]
  mode: string
  options?: string[]
  units?: DistanceUnits
}

interface CalculateRouteResponse {
  route: RouteResult | null
}

export class CalculateRouteUseCase {
  constructor(private readonly routingProvider: RoutingProvider) {}

  async execute({ waypoints, mode, options = [], units }: CalculateRouteRequest): Promise<CalculateRouteResponse> {
    const route = await this.routingProvider.calculateRoutePointToPoint(waypoints, mode, options, units)

    return { route }
  }
}
