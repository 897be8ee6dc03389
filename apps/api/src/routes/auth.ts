import { Router } from 'express'
import { SiweMessage, generateNonce } from 'siwe'
import { SignJWT, jwtVerify } from 'jose'
import { getAddress, isAddress, type Address } from 'viem'
import { z } from 'zod'
import { logger } from '../services/observability'

const NONCE_TTL_MS = 5 * 60 * 1000 // 5 minutes
const JWT_TTL = '24h'
const JWT_ISSUER = 'dualdrop-api'

const verifyBody = z.object({
  message: z.string().min(1),
  signature: z.string().min(1),
})

function encodeSecret(secret: string): Uint8Array {
  return new TextEncoder().encode(secret)
}

export interface AuthRouterOptions {
  jwtSecret: string
  now?: () => number
}

/** Sign-In with Ethereum: one-time nonces, then an HS256 JWT naming the wallet. */
export function createAuthRouter({ jwtSecret, now = Date.now }: AuthRouterOptions): Router {
  const router = Router()
  /** Key = nonce, Value = expiry timestamp. */
  const nonceStore = new Map<string, number>()

  function pruneNonces() {
    const t = now()
    for (const [nonce, expiry] of nonceStore) {
      if (t > expiry) nonceStore.delete(nonce)
    }
  }

  // GET /api/auth/nonce: fresh nonce for the SIWE message
  router.get('/nonce', (_req, res) => {
    pruneNonces()
    const nonce = generateNonce()
    nonceStore.set(nonce, now() + NONCE_TTL_MS)
    res.json({ nonce })
  })

  // POST /api/auth/verify: check the SIWE signature and issue a JWT
  router.post('/verify', async (req, res, next) => {
    const parsed = verifyBody.safeParse(req.body)
    if (!parsed.success) {
      return res.status(400).json({ error: 'message and signature are required' })
    }

    let siweMessage: SiweMessage
    try {
      siweMessage = new SiweMessage(parsed.data.message)
    } catch (err) {
      logger.warn('siwe_message_invalid', {}, err)
      return res.status(400).json({ error: 'Malformed SIWE message' })
    }

    const nonceExpiry = nonceStore.get(siweMessage.nonce)
    if (!nonceExpiry || now() > nonceExpiry) {
      return res.status(401).json({ error: 'Invalid or expired nonce' })
    }

    let address: Address
    let chainId: number
    try {
      const { data: verified } = await siweMessage.verify({ signature: parsed.data.signature })
      address = getAddress(verified.address)
      chainId = verified.chainId
    } catch (err) {
      logger.warn('siwe_verification_failed', { nonce: siweMessage.nonce }, err)
      return res.status(401).json({ error: 'Signature verification failed' })
    }

    // One-time use
    nonceStore.delete(siweMessage.nonce)

    try {
      const token = await issueJwt(address, jwtSecret, chainId)
      res.json({ token, address, chainId })
    } catch (err) {
      next(err)
    }
  })

  return router
}

/**
 * Verify a JWT issued by the auth router and return the wallet address.
 * Returns null if the token is invalid, expired or names no address.
 */
export async function verifyJwt(token: string, jwtSecret: string): Promise<Address | null> {
  try {
    const { payload } = await jwtVerify(token, encodeSecret(jwtSecret), { issuer: JWT_ISSUER })
    return payload.sub && isAddress(payload.sub) ? getAddress(payload.sub) : null
  } catch (err) {
    logger.debug('jwt_rejected', { reason: err instanceof Error ? err.message : String(err) })
    return null
  }
}

/** Issue a token directly. Used by tests and operator tooling. */
export async function issueJwt(address: Address, jwtSecret: string, chainId = 1): Promise<string> {
  return new SignJWT({ chainId })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(getAddress(address))
    .setIssuedAt()
    .setExpirationTime(JWT_TTL)
    .setIssuer(JWT_ISSUER)
    .sign(encodeSecret(jwtSecret))
}
