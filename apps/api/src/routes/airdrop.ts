import { Router } from 'express'
import type { Airdrop } from '@dualdrop/claim-core'

export function createAirdropRouter(airdrop: Airdrop): Router {
  const router = Router()

  // GET /api/airdrop: immutable configuration plus the kill-switch state
  router.get('/', async (_req, res, next) => {
    try {
      res.json({
        merkleRoot: airdrop.merkleRoot,
        trustedSigner: airdrop.trustedSigner,
        chainId: airdrop.chainId,
        verifyingContract: airdrop.verifyingContract,
        domainSeparator: airdrop.domainSeparator,
        payoutToken: airdrop.payoutToken.address,
        owner: airdrop.owner,
        strictSignatureRecipient: airdrop.strictSignatureRecipient,
        signatureVerificationDisabled: await airdrop.isSignatureVerificationDisabled(),
      })
    } catch (err) {
      next(err)
    }
  })

  return router
}
