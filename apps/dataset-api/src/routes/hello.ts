import type { FastifyInstance } from 'fastify'

export function registerHelloRoutes(app: FastifyInstance) {
  app.get('/api/hello', async () => ({
    message: 'Hello World!',
    status: 'API is working',
    timestamp: new Date().toISOString(),
  }))
}
