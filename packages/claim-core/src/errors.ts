import type { Hex } from './types'

/**
 * The payout was submitted (a transaction hash exists) but its outcome is
 * unknown. The claim is kept and the hash recorded for reconciliation.
 */
export class PayoutUnconfirmedError extends Error {
  constructor(
    readonly txHash: Hex,
    options?: { cause?: unknown },
  ) {
    super(`Payout ${txHash} was submitted but not confirmed`, options)
    this.name = 'PayoutUnconfirmedError'
  }
}
