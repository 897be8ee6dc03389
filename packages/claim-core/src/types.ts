/**
 * Shared types for @dualdrop/claim-core.
 * Pure types only: no database, HTTP or chain clients.
 */

import type { Address, Hex } from 'viem'

export type { Address, Hex }

/** Which proof mechanism authorized a claim. */
export type ClaimPath = 'merkle' | 'signature'

/** Rejection reasons (auditable; every failure surfaces as exactly one of these). */
export type ClaimReasonCode =
  | 'AlreadyClaimed'
  | 'InvalidProof'
  | 'InvalidSignature'
  | 'RecipientMismatch'
  | 'SignaturesDisabled'
  | 'PayoutFailed'
  | 'PayoutUnconfirmed'
  | 'NotAuthorized'

/**
 * The external balance-transfer service a successful claim pays out through.
 * A `false` result or a thrown error is fatal to the claim. Throw
 * `PayoutUnconfirmedError` instead when the transfer was submitted but its
 * outcome is unknown: the claim then stays recorded so it cannot be paid twice.
 */
export interface PayoutToken {
  /** Identity of the asset (token contract address, or a label for off-chain ledgers). */
  readonly address: Address
  transfer(to: Address, amount: bigint): Promise<boolean>
}

/** Construction-time configuration; immutable once an instance exists. */
export interface AirdropConfig {
  merkleRoot: Hex
  trustedSigner: Address
  chainId: number
  /** The instance identity signatures are bound to. */
  verifyingContract: Address
}

export interface MerkleClaimEvent {
  type: 'MerkleClaim'
  caller: Address
  recipient: Address
  amount: bigint
}

export interface SignatureClaimEvent {
  type: 'SignatureClaim'
  claimer: Address
  recipient: Address
  amount: bigint
}

export interface ECDSADisabledEvent {
  type: 'ECDSADisabled'
  caller: Address
}

export interface OwnershipTransferredEvent {
  type: 'OwnershipTransferred'
  previousOwner: Address
  newOwner: Address
}

export type AirdropEvent =
  | MerkleClaimEvent
  | SignatureClaimEvent
  | ECDSADisabledEvent
  | OwnershipTransferredEvent

export type AirdropEventListener = (event: AirdropEvent) => void

export type ClaimResult<E extends AirdropEvent = AirdropEvent> =
  | { ok: true; event: E }
  | { ok: false; reason: ClaimReasonCode }

/** A payout submitted as `txHash` whose outcome could not be confirmed. */
export interface UnconfirmedPayout {
  identity: Address
  txHash: Hex
}
