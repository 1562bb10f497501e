import axios, { AxiosInstance, CreateAxiosDefaults } from 'axios'
import https from 'https'
import { env } from '@env/index'
import { getHttpsAgent, sharedHttpsAgent } from './https-agent'

export interface HttpClientConfig extends CreateAxiosDefaults {
  /**
   * Socket-level options for the HTTPS agent. Omit to reuse the shared agent.
   */
  agentOptions?: https.AgentOptions
  /**
   * Idle socket timeout, used as the connect timeout of the agent.
   */
  connectTimeoutMs?: number
}

/**
 * Creates an Axios instance on top of the pooled HTTPS agents.
 * `timeout` is the read timeout of a single request.
 */
export const createHttpClient = (config: HttpClientConfig = {}): AxiosInstance => {
  const { agentOptions, connectTimeoutMs, ...axiosConfig } = config

  const httpsAgent =
    agentOptions || connectTimeoutMs !== undefined
      ? getHttpsAgent({ ...agentOptions, timeout: connectTimeoutMs ?? agentOptions?.timeout })
      : sharedHttpsAgent

  return axios.create({
    httpsAgent,
    timeout: config.timeout ?? env.HTTP_READ_TIMEOUT_MS,
    ...axiosConfig,
  })
}
