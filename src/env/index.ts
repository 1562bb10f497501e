import { z } from 'zod'

const envSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['info', 'debug', 'warn', 'error', 'trace']).default('info'),

  // HERE generation 6.2 (app_id + app_code)
  HERE_APP_ID: z.string().optional(),
  HERE_APP_CODE: z.string().optional(),
  HERE_BATCH_URL: z.url().default('https://batch.geocoder.api.here.com/6.2/jobs'),
  HERE_GEOCODER_URL: z.url().default('https://geocoder.api.here.com/6.2'),

  // HERE v7 (api key)
  HERE_API_KEY: z.string().optional(),
  HERE_BATCH_V7_URL: z.url().default('https://batch.geocoder.ls.hereapi.com/6.2/jobs'),
  HERE_GEOCODER_V7_URL: z.url().default('https://geocode.search.hereapi.com/v1'),

  // Batch job tuning
  HERE_BATCH_MIN_SEARCHES: z.coerce.number().int().positive().default(100),
  HERE_BATCH_MAX_STALLED_RETRIES: z.coerce.number().int().nonnegative().default(100),
  HERE_BATCH_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(5000),

  // HTTP transport
  HTTP_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  HTTP_READ_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  HTTP_MAX_RETRIES: z.coerce.number().int().nonnegative().default(1),

  // Routing (Valhalla compatible)
  ROUTING_API_URL: z.url().default('https://valhalla.mapzen.com/route'),
  ROUTING_API_KEY: z.string().optional(),
})

const _env = envSchema.safeParse(process.env)

if (!_env.success) {
  console.error('Invalid environment variables:', z.treeifyError(_env.error))

  throw new Error('Invalid environment variables. Please check your .env file or environment configuration.')
}

export const env = _env.data
