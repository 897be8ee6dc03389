import {
  concat,
  encodeAbiParameters,
  hexToBigInt,
  hexToNumber,
  isHex,
  keccak256,
  recoverAddress,
  size,
  slice,
  toHex,
  zeroAddress,
  type TypedDataDomain,
} from 'viem'
import { isUint256 } from './merkle'
import type { Address, Hex } from './types'

/** Fixed domain name and version; changing either invalidates every issued signature. */
export const CLAIM_DOMAIN_NAME = 'Airdrop'
export const CLAIM_DOMAIN_VERSION = 'v1'

export const EIP712_DOMAIN_TYPEHASH = keccak256(
  toHex('EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)'),
)
export const CLAIM_TYPEHASH = keccak256(toHex('Claim(address claimer,uint256 amount)'))

/** Typed-data schema for off-chain signers (viem `signTypedData`, ethers `signTypedData`). */
export const CLAIM_TYPES = {
  Claim: [
    { name: 'claimer', type: 'address' },
    { name: 'amount', type: 'uint256' },
  ],
} as const

export function buildClaimDomain(chainId: number, verifyingContract: Address) {
  return {
    name: CLAIM_DOMAIN_NAME,
    version: CLAIM_DOMAIN_VERSION,
    chainId,
    verifyingContract,
  } satisfies TypedDataDomain
}

export function computeDomainSeparator(chainId: number, verifyingContract: Address): Hex {
  return keccak256(
    encodeAbiParameters(
      [{ type: 'bytes32' }, { type: 'bytes32' }, { type: 'bytes32' }, { type: 'uint256' }, { type: 'address' }],
      [
        EIP712_DOMAIN_TYPEHASH,
        keccak256(toHex(CLAIM_DOMAIN_NAME)),
        keccak256(toHex(CLAIM_DOMAIN_VERSION)),
        BigInt(chainId),
        verifyingContract,
      ],
    ),
  )
}

export function hashClaimStruct(claimer: Address, amount: bigint): Hex {
  return keccak256(
    encodeAbiParameters(
      [{ type: 'bytes32' }, { type: 'address' }, { type: 'uint256' }],
      [CLAIM_TYPEHASH, claimer, amount],
    ),
  )
}

/** keccak256("\x19\x01" || domainSeparator || hashStruct(Claim)) */
export function hashClaimTypedData(domainSeparator: Hex, claimer: Address, amount: bigint): Hex {
  return keccak256(concat(['0x1901', domainSeparator, hashClaimStruct(claimer, amount)]))
}

/** secp256k1 n / 2; signatures with a larger s are the malleable twin. */
const SECP256K1_HALF_N = 0x7fffffffffffffffffffffffffffffff5d576e7357a4501ddfe92f46681b20a0n

/**
 * Recover the address that signed `digest`.
 *
 * Only 65-byte `r || s || v` signatures with v of 27 or 28 and a low s are
 * accepted. Anything else, including the compact v of 0/1 and the high-s
 * twin of a valid signature, recovers to the zero address.
 */
export async function recoverSigner(digest: Hex, signature: Hex): Promise<Address> {
  if (!isHex(signature, { strict: true }) || size(signature) !== 65) return zeroAddress

  const s = hexToBigInt(slice(signature, 32, 64))
  const v = hexToNumber(slice(signature, 64, 65))
  if (v !== 27 && v !== 28) return zeroAddress
  if (s > SECP256K1_HALF_N) return zeroAddress

  try {
    return await recoverAddress({ hash: digest, signature })
  } catch {
    // r or s outside the curve order, or no point for r
    return zeroAddress
  }
}

/** Recover the signer of a claim for `claimer`; zero address when the amount cannot be encoded. */
export async function recoverClaimSigner(
  domainSeparator: Hex,
  claimer: Address,
  amount: bigint,
  signature: Hex,
): Promise<Address> {
  if (!isUint256(amount)) return zeroAddress
  return recoverSigner(hashClaimTypedData(domainSeparator, claimer, amount), signature)
}
