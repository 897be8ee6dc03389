import {
  createPublicClient,
  createWalletClient,
  defineChain,
  http,
  parseAbi,
  type Address,
  type Hash,
  type Hex,
  type TransactionReceipt,
} from 'viem'
import { privateKeyToAccount } from 'viem/accounts'
import { PayoutUnconfirmedError, type PayoutToken } from '@dualdrop/claim-core'
import type { Counter, Histogram, StructuredLogger } from '@dualdrop/observability'

const ERC20_ABI = parseAbi([
  'function transfer(address to, uint256 amount) external returns (bool)',
])

// ---- ERC-20 payout ----

export interface Erc20PayoutDeps {
  token: Address
  submitTransfer(to: Address, amount: bigint): Promise<Hash>
  waitForReceipt(hash: Hash): Promise<TransactionReceipt['status']>
  logger: StructuredLogger
}

/**
 * Pays out by calling transfer on an ERC-20 held by the payout account.
 * Once a transaction hash exists the transfer may still land, so a failed
 * receipt wait throws `PayoutUnconfirmedError` instead of reporting false.
 */
export class Erc20Payout implements PayoutToken {
  readonly address: Address

  constructor(private readonly deps: Erc20PayoutDeps) {
    this.address = deps.token
  }

  async transfer(to: Address, amount: bigint): Promise<boolean> {
    const hash = await this.deps.submitTransfer(to, amount)
    let status: TransactionReceipt['status']
    try {
      status = await this.deps.waitForReceipt(hash)
    } catch (err) {
      this.deps.logger.error('payout_receipt_failed', { token: this.address, to, amount, tx_hash: hash }, err)
      throw new PayoutUnconfirmedError(hash, { cause: err })
    }
    if (status !== 'success') {
      this.deps.logger.warn('payout_reverted', { token: this.address, to, amount, tx_hash: hash })
      return false
    }
    this.deps.logger.info('payout_confirmed', { token: this.address, to, amount, tx_hash: hash })
    return true
  }
}

export interface Erc20PayoutConfig {
  rpcUrl: string
  chainId: number
  token: Address
  privateKey: Hex
  logger: StructuredLogger
}

export function createErc20Payout(config: Erc20PayoutConfig): Erc20Payout {
  const chain = defineChain({
    id: config.chainId,
    name: `chain-${config.chainId}`,
    nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
    rpcUrls: { default: { http: [config.rpcUrl] } },
  })
  const publicClient = createPublicClient({ chain, transport: http(config.rpcUrl) })
  const walletClient = createWalletClient({
    account: privateKeyToAccount(config.privateKey),
    chain,
    transport: http(config.rpcUrl),
  })

  return new Erc20Payout({
    token: config.token,
    logger: config.logger,
    submitTransfer: (to, amount) =>
      walletClient.writeContract({
        address: config.token,
        abi: ERC20_ABI,
        functionName: 'transfer',
        args: [to, amount],
      }),
    waitForReceipt: async (hash) => {
      const receipt = await publicClient.waitForTransactionReceipt({ hash })
      return receipt.status
    },
  })
}

// ---- Instrumentation ----

export interface PayoutInstruments {
  latency: Histogram
  failures: Counter
  logger: StructuredLogger
}

/** Wraps a payout with a latency histogram and a failure counter. Outcomes pass through unchanged. */
export function instrumentPayout(payout: PayoutToken, { latency, failures, logger }: PayoutInstruments): PayoutToken {
  return {
    address: payout.address,
    async transfer(to, amount) {
      const stop = latency.startTimer()
      try {
        const ok = await payout.transfer(to, amount)
        stop({ outcome: ok ? 'ok' : 'failed' })
        if (!ok) {
          failures.inc({ kind: 'rejected' })
          logger.warn('payout_failed', { token: payout.address, to, amount })
        }
        return ok
      } catch (err) {
        const kind = err instanceof PayoutUnconfirmedError ? 'unconfirmed' : 'error'
        stop({ outcome: kind })
        failures.inc({ kind })
        throw err
      }
    },
  }
}
