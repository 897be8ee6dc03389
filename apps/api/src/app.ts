import express from 'express'
import cors from 'cors'
import type { Airdrop } from '@dualdrop/claim-core'

import { createAuthRouter } from './routes/auth'
import { createAdminRouter } from './routes/admin'
import { createAirdropRouter } from './routes/airdrop'
import { createClaimsRouter } from './routes/claims'
import { createWalletAuth } from './middleware/auth'
import { errorHandler } from './middleware/errors'
import { createRateLimiters, type RateLimitOptions } from './middleware/rateLimit'
import { observabilityMiddleware } from './middleware/observability'
import { metrics } from './services/observability'

export interface AppOptions {
  airdrop: Airdrop
  jwtSecret: string
  trustWalletHeader?: boolean
  corsOrigin?: string
  checkStore?: () => Promise<boolean>
  rateLimits?: RateLimitOptions
}

export function createApp({
  airdrop,
  jwtSecret,
  trustWalletHeader = false,
  corsOrigin,
  checkStore = async () => true,
  rateLimits = { enabled: process.env.NODE_ENV !== 'test' },
}: AppOptions) {
  const app = express()
  const limits = createRateLimiters(rateLimits)

  // Claim amounts are bigints
  app.set('json replacer', (_key: string, value: unknown) => (typeof value === 'bigint' ? value.toString() : value))

  // Middleware
  app.use(cors({ origin: corsOrigin?.split(',') || '*' }))
  app.use(express.json({ limit: '100kb' }))
  app.use(observabilityMiddleware)
  app.use(createWalletAuth({ jwtSecret, trustWalletHeader }))

  // Rate limiting; runs after wallet auth so claims are keyed by wallet
  app.use('/api/auth', limits.auth)
  app.use('/api/claims/merkle', limits.claims)
  app.use('/api/claims/signature', limits.claims)
  app.use('/api/admin', limits.claims)
  app.use('/api', limits.reads)

  // Liveness
  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.floor(process.uptime()),
    })
  })

  // Readiness: the claim store must answer
  app.get('/readyz', async (_req, res, next) => {
    try {
      const store = await checkStore()
      res.status(store ? 200 : 503).json({
        status: store ? 'ready' : 'not_ready',
        timestamp: new Date().toISOString(),
        checks: { store: store ? 'ok' : 'fail' },
      })
    } catch (err) {
      next(err)
    }
  })

  // Metrics snapshot
  app.get('/metrics', (_req, res) => {
    res.json({
      timestamp: new Date().toISOString(),
      metrics: metrics.asJson(),
    })
  })

  // Routes
  app.use('/api/auth', createAuthRouter({ jwtSecret }))
  app.use('/api/airdrop', createAirdropRouter(airdrop))
  app.use('/api/claims', createClaimsRouter(airdrop))
  app.use('/api/admin', createAdminRouter(airdrop))

  app.use(errorHandler)

  return app
}
