import { Router } from 'express'
import type { Airdrop } from '@dualdrop/claim-core'
import { requireWallet } from '../middleware/auth'
import { addressParam, merkleClaimBody, signatureClaimBody } from './schemas'
import { sendResult } from './results'

export function createClaimsRouter(airdrop: Airdrop): Router {
  const router = Router()

  // POST /api/claims/merkle: claim for a listed recipient (any caller)
  router.post('/merkle', requireWallet, async (req, res, next) => {
    try {
      const { proof, to, amount } = merkleClaimBody.parse(req.body)
      const caller = req.wallet
      if (!caller) return res.status(401).json({ error: 'Authentication required' })
      sendResult(res, 'merkle', await airdrop.merkleClaim(caller, proof, to, amount))
    } catch (err) {
      next(err)
    }
  })

  // POST /api/claims/signature: claim as the caller with a trusted-signer voucher
  router.post('/signature', requireWallet, async (req, res, next) => {
    try {
      const { signature, to, amount } = signatureClaimBody.parse(req.body)
      const caller = req.wallet
      if (!caller) return res.status(401).json({ error: 'Authentication required' })
      sendResult(res, 'signature', await airdrop.signatureClaim(caller, signature, to, amount))
    } catch (err) {
      next(err)
    }
  })

  // GET /api/claims/:address: whether the identity has claimed
  router.get('/:address', async (req, res, next) => {
    try {
      const address = addressParam.parse(req.params.address)
      res.json({ address, claimed: await airdrop.alreadyClaimed(address) })
    } catch (err) {
      next(err)
    }
  })

  return router
}
