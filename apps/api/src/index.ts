import 'dotenv/config'
import { createServer } from 'node:http'

import { createApp } from './app'
import { loadConfig } from './config'
import { buildAirdrop } from './services/airdrop'
import { logger } from './services/observability'

const config = loadConfig()
const runtime = buildAirdrop(config)

const app = createApp({
  airdrop: runtime.airdrop,
  jwtSecret: config.JWT_SECRET,
  trustWalletHeader: config.TRUST_WALLET_HEADER,
  corsOrigin: config.CORS_ORIGIN,
  checkStore: runtime.checkStore,
  rateLimits: { enabled: config.NODE_ENV !== 'test', claimLimit: config.CLAIM_RATE_LIMIT },
})
const server = createServer(app)

runtime.airdrop.subscribe((event) => {
  logger.info('airdrop_event', { ...event })
})

server.listen(config.PORT, () => {
  logger.info('api_listening', {
    port: config.PORT,
    airdrop: runtime.airdrop.verifyingContract,
    chain_id: runtime.airdrop.chainId,
    store: config.DATABASE_URL ? 'postgres' : 'memory',
    payout: config.PAYOUT_TOKEN_ADDRESS ? 'erc20' : 'memory',
    trust_wallet_header: config.TRUST_WALLET_HEADER,
  })
})

function shutdown(signal: string) {
  logger.info('api_shutting_down', { signal })
  server.close((err) => {
    if (err) logger.error('server_close_failed', {}, err)
    runtime.close().then(
      () => process.exit(err ? 1 : 0),
      (closeErr: unknown) => {
        logger.error('store_close_failed', {}, closeErr)
        process.exit(1)
      },
    )
  })
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
