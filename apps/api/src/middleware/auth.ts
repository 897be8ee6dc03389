import type { RequestHandler } from 'express'
import { getAddress, isAddress, type Address } from 'viem'
import { verifyJwt } from '../routes/auth'

declare global {
  namespace Express {
    interface Request {
      /** Caller identity, set by the wallet auth middleware. */
      wallet?: Address
    }
  }
}

export interface WalletAuthOptions {
  jwtSecret: string
  /** Accept an unauthenticated x-wallet-address header. Development only. */
  trustWalletHeader: boolean
}

/**
 * Resolves the caller identity.
 *
 * Priority:
 * 1. Authorization: Bearer <JWT>, issued by the SIWE flow
 * 2. x-wallet-address header, when trustWalletHeader is on
 *
 * Sets `req.wallet` with the checksummed address.
 */
export function createWalletAuth({ jwtSecret, trustWalletHeader }: WalletAuthOptions): RequestHandler {
  return async (req, _res, next) => {
    try {
      const authHeader = req.headers.authorization
      if (authHeader?.startsWith('Bearer ')) {
        const address = await verifyJwt(authHeader.slice(7), jwtSecret)
        if (address) {
          req.wallet = address
          return next()
        }
      }

      if (trustWalletHeader) {
        const header = req.headers['x-wallet-address']
        const wallet = typeof header === 'string' ? header : header?.[0]
        if (wallet && isAddress(wallet, { strict: false })) req.wallet = getAddress(wallet)
      }

      next()
    } catch (err) {
      next(err)
    }
  }
}

/** Rejects requests without a resolved wallet. */
export const requireWallet: RequestHandler = (req, res, next) => {
  if (!req.wallet) {
    return res.status(401).json({ error: 'Authentication required' })
  }
  next()
}
