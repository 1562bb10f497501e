import { env } from '@env/index'
import { ValhallaRoutingProvider } from '@providers/routing-provider/valhalla-routing-provider'
import { CalculateRouteUseCase } from '@use-cases/routing/calculate-route-use-case'

export function makeCalculateRouteUseCase() {
  const routingProvider = new ValhallaRoutingProvider({
    apiUrl: env.ROUTING_API_URL,
    apiKey: env.ROUTING_API_KEY,
    maxRetries: env.HTTP_MAX_RETRIES,
    connectTimeoutMs: env.HTTP_CONNECT_TIMEOUT_MS,
    readTimeoutMs: env.HTTP_READ_TIMEOUT_MS,
  })

  return new CalculateRouteUseCase(routingProvider)
}
