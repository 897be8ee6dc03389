import { getAddress, isAddressEqual, zeroAddress } from 'viem'
import type { Address, ClaimResult, OwnershipTransferredEvent } from './types'

/**
 * Single-owner privilege check for administrative operations.
 * Renouncing leaves the zero address as owner, after which nobody is privileged.
 */
export class ClaimAuthority {
  private currentOwner: Address

  constructor(owner: Address) {
    this.currentOwner = getAddress(owner)
  }

  get owner(): Address {
    return this.currentOwner
  }

  isPrivileged(caller: Address): boolean {
    if (isAddressEqual(this.currentOwner, zeroAddress)) return false
    return isAddressEqual(caller, this.currentOwner)
  }

  transferOwnership(caller: Address, newOwner: Address): ClaimResult<OwnershipTransferredEvent> {
    if (!this.isPrivileged(caller)) return { ok: false, reason: 'NotAuthorized' }
    if (isAddressEqual(newOwner, zeroAddress)) {
      throw new RangeError('New owner is the zero address; use renounceOwnership')
    }
    return { ok: true, event: this.setOwner(getAddress(newOwner)) }
  }

  renounceOwnership(caller: Address): ClaimResult<OwnershipTransferredEvent> {
    if (!this.isPrivileged(caller)) return { ok: false, reason: 'NotAuthorized' }
    return { ok: true, event: this.setOwner(zeroAddress) }
  }

  private setOwner(newOwner: Address): OwnershipTransferredEvent {
    const previousOwner = this.currentOwner
    this.currentOwner = newOwner
    return { type: 'OwnershipTransferred', previousOwner, newOwner }
  }
}
