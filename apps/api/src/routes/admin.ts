import { Router } from 'express'
import { isAddressEqual } from 'viem'
import type { Airdrop } from '@dualdrop/claim-core'
import { requireWallet } from '../middleware/auth'
import { transferOwnershipBody } from './schemas'
import { sendResult } from './results'

/** Owner-only operations. Non-owners get 403 NotAuthorized from the engine. */
export function createAdminRouter(airdrop: Airdrop): Router {
  const router = Router()
  router.use(requireWallet)

  // GET /api/admin/unconfirmed-payouts: claims whose payout still needs reconciling
  router.get('/unconfirmed-payouts', async (req, res, next) => {
    try {
      const caller = req.wallet
      if (!caller) return res.status(401).json({ error: 'Authentication required' })
      if (!isAddressEqual(caller, airdrop.owner)) return res.status(403).json({ error: 'NotAuthorized' })
      res.json({ payouts: await airdrop.unconfirmedPayouts() })
    } catch (err) {
      next(err)
    }
  })

  // POST /api/admin/disable-signatures: one-way kill switch
  router.post('/disable-signatures', async (req, res, next) => {
    try {
      const caller = req.wallet
      if (!caller) return res.status(401).json({ error: 'Authentication required' })
      sendResult(res, 'disable_signatures', await airdrop.disableSignatureVerification(caller))
    } catch (err) {
      next(err)
    }
  })

  router.post('/transfer-ownership', async (req, res, next) => {
    try {
      const { newOwner } = transferOwnershipBody.parse(req.body)
      const caller = req.wallet
      if (!caller) return res.status(401).json({ error: 'Authentication required' })
      sendResult(res, 'transfer_ownership', await airdrop.transferOwnership(caller, newOwner))
    } catch (err) {
      next(err)
    }
  })

  router.post('/renounce-ownership', async (req, res, next) => {
    try {
      const caller = req.wallet
      if (!caller) return res.status(401).json({ error: 'Authentication required' })
      sendResult(res, 'renounce_ownership', await airdrop.renounceOwnership(caller))
    } catch (err) {
      next(err)
    }
  })

  return router
}
