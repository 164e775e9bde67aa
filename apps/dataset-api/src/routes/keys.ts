import type { FastifyInstance } from 'fastify'
import { authenticateBearer, issueApiKey } from '@csvapi/gateway-core'
import type { AppContext } from '../context'

export function registerKeyRoutes(app: FastifyInstance, context: AppContext) {
  // Exchanges a signed-in user's session token for a dataset API key
  app.post('/api/generate-key', async (request, reply) => {
    const auth = await authenticateBearer(request.headers.authorization, context.tokenVerifier)
    if (!auth.ok) throw auth.error

    const { rawKey, record } = await issueApiKey(auth.value)
    context.logger.info({ tenantId: auth.value, keyId: record.id }, '[keys] Issued API key')

    return reply.send({
      api_key: rawKey,
      message: "Store this API key safely. It won't be shown again.",
      user_id: auth.value,
    })
  })
}
