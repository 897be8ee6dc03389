import { encodePacked, hexToBytes, isHex, keccak256, maxUint256, size } from 'viem'
import type { Address, Hex } from './types'

/** Amounts are uint256 on the wire; anything else can never be in a leaf. */
export function isUint256(amount: bigint): boolean {
  return amount >= 0n && amount <= maxUint256
}

export function isBytes32(value: string): value is Hex {
  return isHex(value, { strict: true }) && size(value) === 32
}

/**
 * Leaf for one allocation: keccak256(abi.encodePacked(address, uint256)).
 * Off-chain tree builders must use the exact same encoding.
 */
export function hashLeaf(recipient: Address, amount: bigint): Hex {
  return keccak256(encodePacked(['address', 'uint256'], [recipient, amount]))
}

function compareBytes(a: Hex, b: Hex): number {
  return Buffer.compare(hexToBytes(a), hexToBytes(b))
}

/** Hash two nodes in ascending byte order, so proofs carry no left/right bits. */
export function hashPair(a: Hex, b: Hex): Hex {
  const [left, right] = compareBytes(a, b) <= 0 ? [a, b] : [b, a]
  return keccak256(Buffer.concat([hexToBytes(left), hexToBytes(right)]))
}

export function processProof(leaf: Hex, proof: readonly Hex[]): Hex {
  let computed = leaf
  for (const node of proof) computed = hashPair(computed, node)
  return computed
}

export function verifyMerkleProof(
  proof: readonly Hex[],
  root: Hex,
  recipient: Address,
  amount: bigint,
): boolean {
  if (!isUint256(amount)) return false
  if (!proof.every(isBytes32)) return false
  const computed = processProof(hashLeaf(recipient, amount), proof)
  return computed.toLowerCase() === root.toLowerCase()
}
