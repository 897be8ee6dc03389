/**
 * Dual-proof airdrop: one payout per eligible identity, authorized either by a
 * Merkle proof against the committed root or by an EIP-712 signature from the
 * trusted signer. Both paths funnel into the same claim store.
 *
 * Mutating operations run one at a time per instance, each to completion:
 * verify, reserve the claim, pay out, then commit (or roll back) and notify.
 */

import { getAddress, isAddressEqual, zeroAddress } from 'viem'
import { createLogger, type StructuredLogger } from '@dualdrop/observability'
import { ClaimAuthority } from './authority'
import { PayoutUnconfirmedError } from './errors'
import { InMemoryClaimStore, type ClaimStore } from './ledger'
import { isBytes32, verifyMerkleProof } from './merkle'
import { computeDomainSeparator, recoverClaimSigner } from './typed-data'
import type {
  Address,
  AirdropConfig,
  AirdropEvent,
  AirdropEventListener,
  ClaimPath,
  ClaimReasonCode,
  ClaimResult,
  ECDSADisabledEvent,
  Hex,
  MerkleClaimEvent,
  OwnershipTransferredEvent,
  PayoutToken,
  SignatureClaimEvent,
  UnconfirmedPayout,
} from './types'

export interface AirdropOptions {
  config: AirdropConfig
  payoutToken: PayoutToken
  /** Holder of the kill-switch privilege. */
  owner: Address
  store?: ClaimStore
  /** Reject signature claims whose payout address differs from the caller. */
  strictSignatureRecipient?: boolean
  logger?: StructuredLogger
}

type Operation = ClaimPath | 'admin'

type PayoutOutcome = { status: 'paid' } | { status: 'failed' } | { status: 'unconfirmed'; txHash: Hex }

export class Airdrop {
  readonly merkleRoot: Hex
  readonly trustedSigner: Address
  readonly chainId: number
  readonly verifyingContract: Address
  readonly domainSeparator: Hex
  readonly payoutToken: PayoutToken
  readonly strictSignatureRecipient: boolean

  private readonly store: ClaimStore
  private readonly authority: ClaimAuthority
  private readonly logger: StructuredLogger
  private readonly listeners = new Set<AirdropEventListener>()
  private queue: Promise<void> = Promise.resolve()

  constructor(options: AirdropOptions) {
    const { config } = options
    if (!isBytes32(config.merkleRoot)) {
      throw new RangeError(`merkleRoot must be a 32-byte hex value, got ${config.merkleRoot}`)
    }
    if (!Number.isSafeInteger(config.chainId) || config.chainId <= 0) {
      throw new RangeError(`chainId must be a positive integer, got ${config.chainId}`)
    }

    this.merkleRoot = config.merkleRoot
    this.trustedSigner = getAddress(config.trustedSigner)
    this.chainId = config.chainId
    this.verifyingContract = getAddress(config.verifyingContract)
    this.domainSeparator = computeDomainSeparator(this.chainId, this.verifyingContract)
    this.payoutToken = options.payoutToken
    this.strictSignatureRecipient = options.strictSignatureRecipient ?? false
    this.store = options.store ?? new InMemoryClaimStore()
    this.authority = new ClaimAuthority(options.owner)
    this.logger = (options.logger ?? createLogger()).child({
      component: 'airdrop',
      airdrop: this.verifyingContract,
    })
  }

  // ---- Read-only state ----

  get owner(): Address {
    return this.authority.owner
  }

  isSignatureVerificationDisabled(): Promise<boolean> {
    return this.store.isSignatureVerificationDisabled()
  }

  alreadyClaimed(identity: Address): Promise<boolean> {
    return this.store.isClaimed(identity)
  }

  /** Claims whose payout was submitted but never confirmed; reconcile these by hash. */
  unconfirmedPayouts(): Promise<UnconfirmedPayout[]> {
    return this.store.unconfirmedPayouts()
  }

  // ---- Notifications ----

  subscribe(listener: AirdropEventListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // ---- Claims ----

  /**
   * Claim for a listed recipient. Any caller may submit the proof; the claim
   * record is kept against the recipient and the payout goes to the recipient.
   */
  merkleClaim(
    caller: Address,
    proof: readonly Hex[],
    to: Address,
    amount: bigint,
  ): Promise<ClaimResult<MerkleClaimEvent>> {
    return this.serialize(async (): Promise<ClaimResult<MerkleClaimEvent>> => {
      const recipient = getAddress(to)
      const fields = { caller, recipient, amount }

      if (await this.store.isClaimed(recipient)) return this.reject('merkle', 'AlreadyClaimed', fields)
      if (!verifyMerkleProof(proof, this.merkleRoot, recipient, amount)) {
        return this.reject('merkle', 'InvalidProof', { ...fields, proof_length: proof.length })
      }

      return this.settle('merkle', recipient, recipient, amount, {
        type: 'MerkleClaim',
        caller: getAddress(caller),
        recipient,
        amount,
      })
    })
  }

  /**
   * Claim as the caller. The signature covers (caller, amount); `to` only
   * chooses where the payout goes unless strictSignatureRecipient is set.
   */
  signatureClaim(
    caller: Address,
    signature: Hex,
    to: Address,
    amount: bigint,
  ): Promise<ClaimResult<SignatureClaimEvent>> {
    return this.serialize(async (): Promise<ClaimResult<SignatureClaimEvent>> => {
      const claimer = getAddress(caller)
      const recipient = getAddress(to)
      const fields = { claimer, recipient, amount }

      if (await this.store.isSignatureVerificationDisabled()) {
        return this.reject('signature', 'SignaturesDisabled', fields)
      }
      if (await this.store.isClaimed(claimer)) return this.reject('signature', 'AlreadyClaimed', fields)
      if (this.strictSignatureRecipient && !isAddressEqual(claimer, recipient)) {
        return this.reject('signature', 'RecipientMismatch', fields)
      }

      const recovered = await recoverClaimSigner(this.domainSeparator, claimer, amount, signature)
      if (isAddressEqual(recovered, zeroAddress) || !isAddressEqual(recovered, this.trustedSigner)) {
        return this.reject('signature', 'InvalidSignature', { ...fields, recovered })
      }

      return this.settle('signature', claimer, recipient, amount, {
        type: 'SignatureClaim',
        claimer,
        recipient,
        amount,
      })
    })
  }

  // ---- Administration ----

  /** Permanently turn off signature claims. Idempotent; Merkle claims are unaffected. */
  disableSignatureVerification(caller: Address): Promise<ClaimResult<ECDSADisabledEvent>> {
    return this.serialize(async (): Promise<ClaimResult<ECDSADisabledEvent>> => {
      if (!this.authority.isPrivileged(caller)) return this.reject('admin', 'NotAuthorized', { caller })

      await this.store.disableSignatureVerification()
      const event: ECDSADisabledEvent = { type: 'ECDSADisabled', caller: getAddress(caller) }
      this.logger.warn('signature_verification_disabled', { caller: event.caller })
      this.notify(event)
      return { ok: true, event }
    })
  }

  transferOwnership(caller: Address, newOwner: Address): Promise<ClaimResult<OwnershipTransferredEvent>> {
    return this.serialize(async () => this.afterOwnershipChange(this.authority.transferOwnership(caller, newOwner), caller))
  }

  renounceOwnership(caller: Address): Promise<ClaimResult<OwnershipTransferredEvent>> {
    return this.serialize(async () => this.afterOwnershipChange(this.authority.renounceOwnership(caller), caller))
  }

  // ---- Internals ----

  private afterOwnershipChange(
    result: ClaimResult<OwnershipTransferredEvent>,
    caller: Address,
  ): ClaimResult<OwnershipTransferredEvent> {
    if (!result.ok) return this.reject('admin', result.reason, { caller })
    this.logger.warn('ownership_transferred', {
      previous_owner: result.event.previousOwner,
      new_owner: result.event.newOwner,
    })
    this.notify(result.event)
    return result
  }

  /**
   * Reserve, pay, then commit. A failed payout rolls the reservation back; an
   * unconfirmed one is committed with its hash so the identity cannot be paid twice.
   */
  private async settle<E extends MerkleClaimEvent | SignatureClaimEvent>(
    path: ClaimPath,
    identity: Address,
    to: Address,
    amount: bigint,
    event: E,
  ): Promise<ClaimResult<E>> {
    const reservation = await this.store.reserve(identity, path)
    if (!reservation) return this.reject(path, 'AlreadyClaimed', { identity, amount })

    const outcome = await this.pay(path, to, amount)
    if (outcome.status === 'failed') {
      await reservation.rollback()
      return this.reject(path, 'PayoutFailed', { identity, recipient: to, amount })
    }

    const unconfirmedTx = outcome.status === 'unconfirmed' ? outcome.txHash : undefined
    try {
      await reservation.commit(unconfirmedTx)
    } catch (err) {
      // Tokens may have left the pool but the record did not persist.
      this.logger.error('claim_commit_failed', { path, identity, recipient: to, amount, tx_hash: unconfirmedTx }, err)
      throw err
    }

    if (unconfirmedTx) {
      return this.reject(path, 'PayoutUnconfirmed', { identity, recipient: to, amount, tx_hash: unconfirmedTx })
    }

    this.logger.info('claim_succeeded', { path, identity, recipient: to, amount })
    this.notify(event)
    return { ok: true, event }
  }

  private async pay(path: ClaimPath, to: Address, amount: bigint): Promise<PayoutOutcome> {
    try {
      return (await this.payoutToken.transfer(to, amount)) ? { status: 'paid' } : { status: 'failed' }
    } catch (err) {
      if (err instanceof PayoutUnconfirmedError) {
        this.logger.error('payout_unconfirmed', { path, recipient: to, amount, tx_hash: err.txHash }, err)
        return { status: 'unconfirmed', txHash: err.txHash }
      }
      this.logger.error('payout_error', { path, recipient: to, amount }, err)
      return { status: 'failed' }
    }
  }

  private reject(
    operation: Operation,
    reason: ClaimReasonCode,
    fields: Record<string, unknown>,
  ): { ok: false; reason: ClaimReasonCode } {
    this.logger.info('claim_rejected', { operation, reason, ...fields })
    return { ok: false, reason }
  }

  private notify(event: AirdropEvent) {
    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (err) {
        this.logger.error('listener_failed', { event: event.type }, err)
      }
    }
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.queue.then(operation)
    // The caller observes failures through `run`; the queue only orders work.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }
}
