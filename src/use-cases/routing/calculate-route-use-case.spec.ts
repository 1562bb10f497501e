import { describe, it, expect, vi } from 'vitest'
import { DistanceUnits, RoutingProvider } from '@providers/routing-provider/routing-provider.interface'
import { CalculateRouteUseCase } from './calculate-route-use-case'

describe('CalculateRouteUseCase', () => {
  it('should forward the waypoints, mode and options to the routing provider', async () => {
    const route = { shape: [{ lon: 1, lat: 2 }], length: 3.5, duration: 420 }
    const calculateRoutePointToPoint = vi.fn().mockResolvedValue(route)
    const routingProvider: RoutingProvider = { calculateRoutePointToPoint }
    const waypoints = [
      { lon: 1, lat: 2 },
      { lon: 1.1, lat: 2.1 },
    ]

    const response = await new CalculateRouteUseCase(routingProvider).execute({
      waypoints,
      mode: 'bicycle',
      units: DistanceUnits.MILES,
    })

    expect(calculateRoutePointToPoint).toHaveBeenCalledWith(waypoints, 'bicycle', [], DistanceUnits.MILES)
    expect(response).toEqual({ route })
  })

  it('should return a null route when no route exists', async () => {
    const routingProvider: RoutingProvider = { calculateRoutePointToPoint: vi.fn().mockResolvedValue(null) }

    const response = await new CalculateRouteUseCase(routingProvider).execute({
      waypoints: [
        { lon: 0, lat: 0 },
        { lon: 0, lat: 1 },
      ],
      mode: 'walk',
    })

    expect(response.route).toBeNull()
  })
})
