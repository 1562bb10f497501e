import https from 'https'

const agents = new Map<string, https.Agent>()

/**
 * Keep-alive pool shared by every provider client.
 * Batch downloads can take long, so sockets are allowed 60s of inactivity.
 */
const DEFAULT_CONFIG: https.AgentOptions = {
  keepAlive: true,
  keepAliveMsecs: 1000,
  maxSockets: 16,
  maxFreeSockets: 4,
  timeout: 60000,
  scheduling: 'lifo',
}

/**
 * Returns one agent per distinct configuration.
 */
export const getHttpsAgent = (options: https.AgentOptions = {}): https.Agent => {
  const definedOptions = Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined))
  const finalConfig: https.AgentOptions = { ...DEFAULT_CONFIG, ...definedOptions }

  const key = JSON.stringify(finalConfig, Object.keys(finalConfig).sort())

  const existing = agents.get(key)
  if (existing) {
    return existing
  }

  const agent = new https.Agent(finalConfig)
  agents.set(key, agent)

  return agent
}

export const sharedHttpsAgent = getHttpsAgent()
