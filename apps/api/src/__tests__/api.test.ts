import { describe, it, expect, beforeEach } from 'vitest'
import request from 'supertest'
import type { Express } from 'express'
import { InMemoryTokenLedger, PayoutUnconfirmedError } from '@dualdrop/claim-core'

import { createApp } from '../app'
import { issueJwt } from '../routes/auth'
import {
  ADDRESSES,
  DOMAIN_SEPARATOR,
  FIVE_TOKENS,
  JWT_SECRET,
  LEAF_ALICE,
  LEAF_BOB,
  ONE_TOKEN,
  ROOT,
  SIG_ALICE,
  TOKEN,
  makeAirdrop,
} from './fixtures'

const { alice, bob, mallory, owner, contract } = ADDRESSES
const TX = '0x00000000000000000000000000000000000000000000000000000000000000aa'

let app: Express
let ledger: InMemoryTokenLedger

beforeEach(() => {
  const built = makeAirdrop()
  ledger = built.ledger
  app = createApp({ airdrop: built.airdrop, jwtSecret: JWT_SECRET, trustWalletHeader: true })
})

describe('health and metrics', () => {
  it('GET /healthz reports ok', async () => {
    const res = await request(app).get('/healthz')
    expect(res.status).toBe(200)
    expect(res.body.status).toBe('ok')
  })

  it('GET /readyz reflects the store check', async () => {
    const { airdrop } = makeAirdrop()
    const down = createApp({ airdrop, jwtSecret: JWT_SECRET, checkStore: async () => false })

    const ready = await request(app).get('/readyz')
    expect(ready.status).toBe(200)
    expect(ready.body.checks).toEqual({ store: 'ok' })

    const notReady = await request(down).get('/readyz')
    expect(notReady.status).toBe(503)
    expect(notReady.body.status).toBe('not_ready')
  })

  it('echoes X-Request-Id', async () => {
    const res = await request(app).get('/healthz').set('X-Request-Id', 'req-123')
    expect(res.headers['x-request-id']).toBe('req-123')
  })

  it('counts claim outcomes', async () => {
    await request(app)
      .post('/api/claims/merkle')
      .set('x-wallet-address', bob)
      .send({ proof: [LEAF_ALICE], to: bob, amount: FIVE_TOKENS })

    const res = await request(app).get('/metrics')
    const claims = res.body.metrics.counters.find((c: { name: string }) => c.name === 'airdrop_claims_total')
    expect(claims.series).toContainEqual(
      expect.objectContaining({ labels: { operation: 'merkle', result: 'ok' } }),
    )
  })
})

describe('GET /api/airdrop', () => {
  it('returns the instance configuration', async () => {
    const res = await request(app).get('/api/airdrop')
    expect(res.status).toBe(200)
    expect(res.body).toEqual({
      merkleRoot: ROOT,
      trustedSigner: ADDRESSES.signer,
      chainId: 31337,
      verifyingContract: contract,
      domainSeparator: DOMAIN_SEPARATOR,
      payoutToken: TOKEN,
      owner,
      strictSignatureRecipient: false,
      signatureVerificationDisabled: false,
    })
  })
})

describe('POST /api/claims/merkle', () => {
  it('requires a caller identity', async () => {
    const res = await request(app)
      .post('/api/claims/merkle')
      .send({ proof: [LEAF_ALICE], to: bob, amount: FIVE_TOKENS })
    expect(res.status).toBe(401)
    expect(res.body).toEqual({ error: 'Authentication required' })
  })

  it('pays a listed recipient once', async () => {
    const body = { proof: [LEAF_ALICE], to: bob, amount: FIVE_TOKENS }

    const res = await request(app).post('/api/claims/merkle').set('x-wallet-address', bob).send(body)
    expect(res.status).toBe(200)
    expect(res.body).toEqual({
      event: { type: 'MerkleClaim', caller: bob, recipient: bob, amount: FIVE_TOKENS },
    })
    expect(ledger.balanceOf(bob)).toBe(5n * 10n ** 18n)

    const replay = await request(app).post('/api/claims/merkle').set('x-wallet-address', bob).send(body)
    expect(replay.status).toBe(409)
    expect(replay.body).toEqual({ error: 'AlreadyClaimed' })
  })

  it('accepts lowercase addresses and a numeric amount', async () => {
    const res = await request(app)
      .post('/api/claims/merkle')
      .set('x-wallet-address', mallory.toLowerCase())
      .send({ proof: [LEAF_BOB], to: alice.toLowerCase(), amount: 1e15 })

    // 1e15 is not alice's allocation
    expect(res.status).toBe(400)
    expect(res.body).toEqual({ error: 'InvalidProof' })
  })

  it('rejects a proof for the wrong amount', async () => {
    const res = await request(app)
      .post('/api/claims/merkle')
      .set('x-wallet-address', bob)
      .send({ proof: [LEAF_ALICE], to: bob, amount: ONE_TOKEN })
    expect(res.status).toBe(400)
    expect(res.body).toEqual({ error: 'InvalidProof' })
  })

  it('validates the request body', async () => {
    const res = await request(app)
      .post('/api/claims/merkle')
      .set('x-wallet-address', bob)
      .send({ proof: ['not-hex'], to: bob, amount: '5e18' })
    expect(res.status).toBe(400)
    expect(res.body.error).toBe('Invalid request')
    expect(res.body.issues.map((i: { path: Array<string | number> }) => i.path.join('.'))).toEqual([
      'proof.0',
      'amount',
    ])
  })

  it('answers 502 when the pool cannot pay', async () => {
    const { airdrop } = makeAirdrop({}, 0n)
    const broke = createApp({ airdrop, jwtSecret: JWT_SECRET, trustWalletHeader: true })

    const res = await request(broke)
      .post('/api/claims/merkle')
      .set('x-wallet-address', bob)
      .send({ proof: [LEAF_ALICE], to: bob, amount: FIVE_TOKENS })
    expect(res.status).toBe(502)
    expect(res.body).toEqual({ error: 'PayoutFailed' })

    const status = await request(broke).get(`/api/claims/${bob}`)
    expect(status.body).toEqual({ address: bob, claimed: false })
  })

  it('answers 504 and keeps the claim when the payout is unconfirmed', async () => {
    const { airdrop } = makeAirdrop({
      payoutToken: {
        address: TOKEN,
        transfer: async () => {
          throw new PayoutUnconfirmedError(TX)
        },
      },
    })
    const pending = createApp({ airdrop, jwtSecret: JWT_SECRET, trustWalletHeader: true })
    const body = { proof: [LEAF_ALICE], to: bob, amount: FIVE_TOKENS }

    const res = await request(pending).post('/api/claims/merkle').set('x-wallet-address', bob).send(body)
    expect(res.status).toBe(504)
    expect(res.body).toEqual({ error: 'PayoutUnconfirmed' })

    const retry = await request(pending).post('/api/claims/merkle').set('x-wallet-address', bob).send(body)
    expect(retry.status).toBe(409)

    const list = await request(pending).get('/api/admin/unconfirmed-payouts').set('x-wallet-address', owner)
    expect(list.status).toBe(200)
    expect(list.body).toEqual({ payouts: [{ identity: bob, txHash: TX }] })
  })
})

describe('POST /api/claims/signature', () => {
  it('pays the caller for a trusted voucher', async () => {
    const res = await request(app)
      .post('/api/claims/signature')
      .set('x-wallet-address', alice)
      .send({ signature: SIG_ALICE, to: alice, amount: ONE_TOKEN })

    expect(res.status).toBe(200)
    expect(res.body).toEqual({
      event: { type: 'SignatureClaim', claimer: alice, recipient: alice, amount: ONE_TOKEN },
    })
  })

  it('rejects a voucher presented by someone else', async () => {
    const res = await request(app)
      .post('/api/claims/signature')
      .set('x-wallet-address', bob)
      .send({ signature: SIG_ALICE, to: bob, amount: ONE_TOKEN })
    expect(res.status).toBe(401)
    expect(res.body).toEqual({ error: 'InvalidSignature' })
  })

  it('authenticates with a bearer token', async () => {
    const token = await issueJwt(alice, JWT_SECRET)
    const res = await request(app)
      .post('/api/claims/signature')
      .set('Authorization', `Bearer ${token}`)
      .send({ signature: SIG_ALICE, to: alice, amount: ONE_TOKEN })
    expect(res.status).toBe(200)
    expect(res.body.event.claimer).toBe(alice)
  })

  it('shares the claim record with the Merkle path', async () => {
    await request(app)
      .post('/api/claims/merkle')
      .set('x-wallet-address', bob)
      .send({ proof: [LEAF_BOB], to: alice, amount: ONE_TOKEN })

    const res = await request(app)
      .post('/api/claims/signature')
      .set('x-wallet-address', alice)
      .send({ signature: SIG_ALICE, to: alice, amount: ONE_TOKEN })
    expect(res.status).toBe(409)
    expect(res.body).toEqual({ error: 'AlreadyClaimed' })
  })
})

describe('GET /api/claims/:address', () => {
  it('reports claim status under the checksummed address', async () => {
    await request(app)
      .post('/api/claims/signature')
      .set('x-wallet-address', alice)
      .send({ signature: SIG_ALICE, to: alice, amount: ONE_TOKEN })

    const res = await request(app).get(`/api/claims/${alice.toLowerCase()}`)
    expect(res.status).toBe(200)
    expect(res.body).toEqual({ address: alice, claimed: true })
  })

  it('rejects a malformed address', async () => {
    const res = await request(app).get('/api/claims/0x1234')
    expect(res.status).toBe(400)
    expect(res.body.error).toBe('Invalid request')
  })
})

describe('admin', () => {
  it('refuses non-owners', async () => {
    const res = await request(app).post('/api/admin/disable-signatures').set('x-wallet-address', mallory)
    expect(res.status).toBe(403)
    expect(res.body).toEqual({ error: 'NotAuthorized' })
  })

  it('disables signature claims for good', async () => {
    const res = await request(app).post('/api/admin/disable-signatures').set('x-wallet-address', owner)
    expect(res.status).toBe(200)
    expect(res.body).toEqual({ event: { type: 'ECDSADisabled', caller: owner } })

    const claim = await request(app)
      .post('/api/claims/signature')
      .set('x-wallet-address', alice)
      .send({ signature: SIG_ALICE, to: alice, amount: ONE_TOKEN })
    expect(claim.status).toBe(410)
    expect(claim.body).toEqual({ error: 'SignaturesDisabled' })

    const state = await request(app).get('/api/airdrop')
    expect(state.body.signatureVerificationDisabled).toBe(true)
  })

  it('lists unconfirmed payouts to the owner only', async () => {
    const res = await request(app).get('/api/admin/unconfirmed-payouts').set('x-wallet-address', owner)
    expect(res.status).toBe(200)
    expect(res.body).toEqual({ payouts: [] })

    const denied = await request(app).get('/api/admin/unconfirmed-payouts').set('x-wallet-address', mallory)
    expect(denied.status).toBe(403)
    expect(denied.body).toEqual({ error: 'NotAuthorized' })
  })

  it('transfers ownership', async () => {
    const res = await request(app)
      .post('/api/admin/transfer-ownership')
      .set('x-wallet-address', owner)
      .send({ newOwner: bob })
    expect(res.status).toBe(200)
    expect(res.body).toEqual({ event: { type: 'OwnershipTransferred', previousOwner: owner, newOwner: bob } })

    const byOldOwner = await request(app).post('/api/admin/disable-signatures').set('x-wallet-address', owner)
    expect(byOldOwner.status).toBe(403)
  })
})

describe('wallet header trust', () => {
  it('ignores x-wallet-address unless enabled', async () => {
    const { airdrop } = makeAirdrop()
    const strict = createApp({ airdrop, jwtSecret: JWT_SECRET })

    const res = await request(strict)
      .post('/api/claims/signature')
      .set('x-wallet-address', alice)
      .send({ signature: SIG_ALICE, to: alice, amount: ONE_TOKEN })
    expect(res.status).toBe(401)
    expect(res.body).toEqual({ error: 'Authentication required' })
  })
})

describe('rate limiting', () => {
  it('limits claim submissions per wallet', async () => {
    const { airdrop } = makeAirdrop()
    const limited = createApp({
      airdrop,
      jwtSecret: JWT_SECRET,
      trustWalletHeader: true,
      rateLimits: { enabled: true, claimLimit: 2 },
    })
    const body = { proof: [LEAF_ALICE], to: bob, amount: FIVE_TOKENS }

    const first = await request(limited).post('/api/claims/merkle').set('x-wallet-address', bob).send(body)
    expect(first.status).toBe(200)
    const second = await request(limited).post('/api/claims/merkle').set('x-wallet-address', bob).send(body)
    expect(second.status).toBe(409)
    const third = await request(limited).post('/api/claims/merkle').set('x-wallet-address', bob).send(body)
    expect(third.status).toBe(429)
    expect(third.body).toEqual({ error: 'RateLimited' })

    const other = await request(limited)
      .post('/api/claims/signature')
      .set('x-wallet-address', alice)
      .send({ signature: SIG_ALICE, to: alice, amount: ONE_TOKEN })
    expect(other.status).toBe(200)
  })
})

describe('ownership validation', () => {
  it('rejects the zero address as a new owner', async () => {
    const res = await request(app)
      .post('/api/admin/transfer-ownership')
      .set('x-wallet-address', owner)
      .send({ newOwner: '0x0000000000000000000000000000000000000000' })
    expect(res.status).toBe(400)
    expect(res.body.error).toBe('Invalid request')
  })
})
