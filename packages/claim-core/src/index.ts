export { Airdrop } from './airdrop'
export type { AirdropOptions } from './airdrop'
export { ClaimAuthority } from './authority'
export { InMemoryClaimStore } from './ledger'
export type { ClaimStore, ClaimReservation } from './ledger'
export { PayoutUnconfirmedError } from './errors'
export { hashLeaf, hashPair, processProof, verifyMerkleProof, isBytes32, isUint256 } from './merkle'
export { buildMerkleTree, createDistribution } from './tree'
export type { AllocationEntry, MerkleTree, Distribution, DistributionClaim } from './tree'
export {
  CLAIM_DOMAIN_NAME,
  CLAIM_DOMAIN_VERSION,
  CLAIM_TYPEHASH,
  CLAIM_TYPES,
  EIP712_DOMAIN_TYPEHASH,
  buildClaimDomain,
  computeDomainSeparator,
  hashClaimStruct,
  hashClaimTypedData,
  recoverClaimSigner,
  recoverSigner,
} from './typed-data'
export { InMemoryTokenLedger } from './payout'
export type {
  Address,
  Hex,
  AirdropConfig,
  AirdropEvent,
  AirdropEventListener,
  ClaimPath,
  ClaimReasonCode,
  ClaimResult,
  ECDSADisabledEvent,
  MerkleClaimEvent,
  OwnershipTransferredEvent,
  PayoutToken,
  SignatureClaimEvent,
  UnconfirmedPayout,
} from './types'
