import { getAddress } from 'viem'
import type { Address, PayoutToken } from './types'

/**
 * Balance ledger held in memory. Backs development deployments and tests;
 * production instances pay out through an ERC-20 contract instead.
 */
export class InMemoryTokenLedger implements PayoutToken {
  private readonly balances = new Map<Address, bigint>()

  constructor(
    readonly address: Address,
    /** Account the airdrop pays out from. */
    readonly treasury: Address,
  ) {}

  mint(to: Address, amount: bigint) {
    if (amount < 0n) throw new RangeError('Cannot mint a negative amount')
    const key = getAddress(to)
    this.balances.set(key, this.balanceOf(key) + amount)
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(getAddress(account)) ?? 0n
  }

  async transfer(to: Address, amount: bigint): Promise<boolean> {
    const from = getAddress(this.treasury)
    const available = this.balanceOf(from)
    if (amount < 0n || amount > available) return false
    this.balances.set(from, available - amount)
    const key = getAddress(to)
    this.balances.set(key, this.balanceOf(key) + amount)
    return true
  }
}
