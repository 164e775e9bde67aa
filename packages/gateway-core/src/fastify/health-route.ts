import type { FastifyInstance } from 'fastify'

export type HealthCheckFn = () => Promise<Record<string, 'ok' | 'error'>>

export function registerHealthRoute(app: FastifyInstance, serviceName: string, check?: HealthCheckFn) {
  app.get('/health', async (_request, reply) => {
    const checks = check ? await check() : {}
    const ok = Object.values(checks).every((status) => status === 'ok')
    return reply.code(ok ? 200 : 503).send({ ok, service: serviceName, checks })
  })
}
