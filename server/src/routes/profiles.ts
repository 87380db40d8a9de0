import { Router, Request, Response } from 'express'
import type { ProfileRegistry } from '../models/Profile'
import { TIER_LABELS, TIER_ORDER } from '../models/Profile'

/** GET /api/profiles: the catalog, flat and grouped by tier, for selection UIs. */
export function createProfileRoutes(registry: ProfileRegistry): Router {
  const router = Router()

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      profiles: registry.all(),
      tiers: TIER_ORDER.map((tier) => ({
        tier,
        label: TIER_LABELS[tier],
        profiles: registry.byTier(tier).map((p) => p.name),
      })),
      presets: {
        all: registry.preset('all').map((p) => p.name),
        'high-quality': registry.preset('high-quality').map((p) => p.name),
      },
    })
  })

  return router
}
