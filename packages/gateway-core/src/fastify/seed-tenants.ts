import { z } from 'zod'
import type { Logger } from '@csvapi/observability'
import { hashApiKey, registerApiKey } from '../auth/api-key-service'
import { registerSubdomain } from '../auth/subdomain-service'

const seedSchema = z.array(
  z.object({
    tenantId: z.string().min(1),
    rawKey: z.string().min(1),
    subdomain: z.string().min(1).optional(),
  }),
)

/**
 * Seeds the in-memory key and subdomain registries from a JSON env var, e.g.
 * `[{"tenantId":"42","rawKey":"dev-key","subdomain":"acme"}]`.
 */
export function seedTenantsFromEnv(envKey: string, logger: Logger): number {
  const raw = process.env[envKey]
  if (!raw) return 0

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (e) {
    logger.error({ err: e }, `[auth] ${envKey} is not valid JSON`)
    return 0
  }

  const seeds = seedSchema.safeParse(parsed)
  if (!seeds.success) {
    logger.error({ issues: seeds.error.issues }, `[auth] Failed to parse ${envKey}`)
    return 0
  }

  for (const s of seeds.data) {
    // Keyed by hash so a tenant can hold several seeded keys
    const id = `key_${s.tenantId}_${hashApiKey(s.rawKey).slice(0, 12)}`
    registerApiKey({ id, tenantId: s.tenantId, rawKey: s.rawKey, createdAt: new Date().toISOString() })
    if (s.subdomain) registerSubdomain(s.subdomain, s.tenantId)
  }
  logger.info(`[auth] Seeded ${seeds.data.length} tenant(s)`)
  return seeds.data.length
}
