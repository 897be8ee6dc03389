import { getAddress } from 'viem'
import type { Address, ClaimPath, Hex, UnconfirmedPayout } from './types'

/**
 * A claim held between the check-and-set and the payout outcome.
 * While held, the identity already reads as claimed.
 */
export interface ClaimReservation {
  /**
   * Make the claim permanent. `unconfirmedTx` marks a payout that was
   * submitted but not confirmed.
   */
  commit(unconfirmedTx?: Hex): Promise<void>
  /** Undo the reservation; the identity reads as unclaimed again. */
  rollback(): Promise<void>
}

/**
 * The only mutable airdrop state: the one-time claim record and the
 * signature kill switch. Each airdrop instance owns its own store.
 */
export interface ClaimStore {
  isClaimed(identity: Address): Promise<boolean>
  /**
   * Atomically mark `identity` as claimed. Resolves to null when it was
   * already claimed (or reserved by an operation still in flight).
   */
  reserve(identity: Address, path: ClaimPath): Promise<ClaimReservation | null>
  /** Claims committed with a payout still awaiting reconciliation, oldest first. */
  unconfirmedPayouts(): Promise<UnconfirmedPayout[]>
  isSignatureVerificationDisabled(): Promise<boolean>
  /** One-way; there is no operation that turns signatures back on. */
  disableSignatureVerification(): Promise<void>
}

export class InMemoryClaimStore implements ClaimStore {
  private readonly records = new Map<Address, ClaimPath>()
  private readonly unconfirmed: UnconfirmedPayout[] = []
  private signaturesDisabled = false

  async isClaimed(identity: Address): Promise<boolean> {
    return this.records.has(getAddress(identity))
  }

  async reserve(identity: Address, path: ClaimPath): Promise<ClaimReservation | null> {
    const key = getAddress(identity)
    if (this.records.has(key)) return null
    this.records.set(key, path)

    let settled = false
    const settle = () => {
      if (settled) throw new Error(`Reservation for ${key} already settled`)
      settled = true
    }

    return {
      commit: async (unconfirmedTx) => {
        settle()
        if (unconfirmedTx) this.unconfirmed.push({ identity: key, txHash: unconfirmedTx })
      },
      rollback: async () => {
        settle()
        this.records.delete(key)
      },
    }
  }

  async unconfirmedPayouts(): Promise<UnconfirmedPayout[]> {
    return [...this.unconfirmed]
  }

  async isSignatureVerificationDisabled(): Promise<boolean> {
    return this.signaturesDisabled
  }

  async disableSignatureVerification(): Promise<void> {
    this.signaturesDisabled = true
  }
}
