import { Airdrop, InMemoryClaimStore, InMemoryTokenLedger, type ClaimStore, type PayoutToken } from '@dualdrop/claim-core'
import type pg from 'pg'
import type { ApiConfig } from '../config'
import { createPool, PgClaimStore } from '../db'
import { createErc20Payout, instrumentPayout } from './payout'
import { logger, payoutFailuresTotal, payoutLatencyMs } from './observability'

export interface AirdropRuntime {
  airdrop: Airdrop
  /** Resolves true when the claim store answers. */
  checkStore(): Promise<boolean>
  close(): Promise<void>
}

function buildPayout(config: ApiConfig): PayoutToken {
  if (config.RPC_URL && config.PAYOUT_TOKEN_ADDRESS && config.PAYOUT_PRIVATE_KEY) {
    return createErc20Payout({
      rpcUrl: config.RPC_URL,
      chainId: config.CHAIN_ID,
      token: config.PAYOUT_TOKEN_ADDRESS,
      privateKey: config.PAYOUT_PRIVATE_KEY,
      logger: logger.child({ component: 'payout' }),
    })
  }
  // Development ledger: the airdrop address holds the pool and starts empty
  logger.warn('payout_in_memory', { reason: 'RPC_URL, PAYOUT_TOKEN_ADDRESS and PAYOUT_PRIVATE_KEY not set' })
  return new InMemoryTokenLedger(config.AIRDROP_ADDRESS, config.AIRDROP_ADDRESS)
}

/** Wires the engine to its store and payout per config. */
export function buildAirdrop(config: ApiConfig): AirdropRuntime {
  let pool: pg.Pool | undefined
  let store: ClaimStore
  let checkStore: () => Promise<boolean>

  if (config.DATABASE_URL) {
    const db = createPool(config.DATABASE_URL, logger)
    const pgStore = new PgClaimStore(db, config.AIRDROP_ADDRESS)
    pool = db
    store = pgStore
    checkStore = async () => {
      try {
        return await pgStore.ping()
      } catch (err) {
        logger.warn('store_unreachable', {}, err)
        return false
      }
    }
  } else {
    logger.warn('claim_store_in_memory', { reason: 'DATABASE_URL not set' })
    store = new InMemoryClaimStore()
    checkStore = async () => true
  }

  const airdrop = new Airdrop({
    config: {
      merkleRoot: config.MERKLE_ROOT,
      trustedSigner: config.TRUSTED_SIGNER,
      chainId: config.CHAIN_ID,
      verifyingContract: config.AIRDROP_ADDRESS,
    },
    payoutToken: instrumentPayout(buildPayout(config), {
      latency: payoutLatencyMs,
      failures: payoutFailuresTotal,
      logger,
    }),
    owner: config.OWNER_ADDRESS,
    store,
    strictSignatureRecipient: config.STRICT_SIGNATURE_RECIPIENT,
    logger,
  })

  return {
    airdrop,
    checkStore,
    close: async () => {
      await pool?.end()
    },
  }
}
