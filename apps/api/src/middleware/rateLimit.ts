import type { Request, RequestHandler } from 'express'
import rateLimit from 'express-rate-limit'

export interface RateLimitOptions {
  enabled: boolean
  windowMs?: number
  /** SIWE nonce and verification, per client IP */
  authLimit?: number
  /** Claim and admin submissions, per authenticated wallet */
  claimLimit?: number
  /** Everything else under /api, per client IP */
  readLimit?: number
}

export interface RateLimiters {
  auth: RequestHandler
  claims: RequestHandler
  reads: RequestHandler
}

// Falls back to the IP for unauthenticated requests, which the routes then answer with 401
function walletKey(req: Request): string {
  return req.wallet ?? req.ip ?? 'anonymous'
}

export function createRateLimiters({
  enabled,
  windowMs = 60 * 1000,
  authLimit = 10,
  claimLimit = 5,
  readLimit = 100,
}: RateLimitOptions): RateLimiters {
  const limiter = (limit: number, keyGenerator?: (req: Request) => string) =>
    rateLimit({
      windowMs,
      limit,
      standardHeaders: 'draft-7',
      legacyHeaders: false,
      message: { error: 'RateLimited' },
      skip: () => !enabled,
      ...(keyGenerator ? { keyGenerator } : {}),
    })

  return {
    auth: limiter(authLimit),
    claims: limiter(claimLimit, walletKey),
    reads: limiter(readLimit),
  }
}
