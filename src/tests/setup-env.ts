/* setup-env.ts
 * Used mainly for tests / local bootstrap when .env is not loaded
 */

/* --------------------------------------------------
 * App
 * -------------------------------------------------- */
process.env.NODE_ENV ??= 'test'
process.env.LOG_LEVEL ??= 'error'

const isTest = process.env.NODE_ENV === 'test'

/* --------------------------------------------------
 * HERE credentials
 * -------------------------------------------------- */
process.env.HERE_APP_ID ??= isTest ? 'test-app-id' : ''
process.env.HERE_APP_CODE ??= isTest ? 'test-app-code' : ''
process.env.HERE_API_KEY ??= isTest ? 'test-api-key' : ''

/* --------------------------------------------------
 * HERE endpoints
 * -------------------------------------------------- */
process.env.HERE_BATCH_URL ??= 'https://batch.geocoder.api.here.com/6.2/jobs'
process.env.HERE_BATCH_V7_URL ??= 'https://batch.geocoder.ls.hereapi.com/6.2/jobs'
process.env.HERE_GEOCODER_URL ??= 'https://geocoder.api.here.com/6.2'
process.env.HERE_GEOCODER_V7_URL ??= 'https://geocode.search.hereapi.com/v1'

/* --------------------------------------------------
 * Batch tuning
 * -------------------------------------------------- */
process.env.HERE_BATCH_MIN_SEARCHES ??= '100'
process.env.HERE_BATCH_MAX_STALLED_RETRIES ??= '100'
process.env.HERE_BATCH_POLL_INTERVAL_MS ??= '5000'

/* --------------------------------------------------
 * Routing
 * -------------------------------------------------- */
process.env.ROUTING_API_URL ??= 'https://valhalla.mapzen.com/route'
process.env.ROUTING_API_KEY ??= isTest ? 'test-routing-key' : ''
