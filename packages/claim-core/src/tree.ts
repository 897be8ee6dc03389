/**
 * Off-chain distribution tooling: builds the tree `merkleClaim` verifies against.
 *
 * Layers are built with the same sorted-pair hashing as the verifier. An odd
 * node at the end of a layer is promoted unchanged to the next layer, so its
 * proof has no sibling at that level.
 */

import { getAddress, zeroHash } from 'viem'
import { hashLeaf, hashPair, isUint256 } from './merkle'
import type { Address, Hex } from './types'

export interface AllocationEntry {
  address: Address
  amount: bigint
}

export interface MerkleTree {
  root: Hex
  leaves: Hex[]
  layers: Hex[][]
  getProof(index: number): Hex[]
}

export interface DistributionClaim {
  index: number
  /** Decimal string for JSON safety. */
  amount: string
  proof: Hex[]
}

export interface Distribution {
  merkleRoot: Hex
  tokenTotal: string
  claims: Record<Address, DistributionClaim>
}

export function buildMerkleTree(leaves: Hex[]): MerkleTree {
  if (leaves.length === 0) {
    return { root: zeroHash, leaves: [], layers: [[]], getProof: () => [] }
  }

  const layers: Hex[][] = [leaves]
  let current = leaves
  while (current.length > 1) {
    const next: Hex[] = []
    for (let i = 0; i < current.length; i += 2) {
      next.push(i + 1 < current.length ? hashPair(current[i], current[i + 1]) : current[i])
    }
    layers.push(next)
    current = next
  }

  return {
    root: current[0],
    leaves,
    layers,
    getProof(index: number): Hex[] {
      if (!Number.isInteger(index) || index < 0 || index >= leaves.length) {
        throw new RangeError(`Leaf index out of range: ${index}`)
      }
      const proof: Hex[] = []
      let idx = index
      for (let layer = 0; layer < layers.length - 1; layer++) {
        const nodes = layers[layer]
        const siblingIndex = idx % 2 === 1 ? idx - 1 : idx + 1
        if (siblingIndex < nodes.length) proof.push(nodes[siblingIndex])
        idx = Math.floor(idx / 2)
      }
      return proof
    },
  }
}

/**
 * Build the tree and per-address proofs for an allocation list.
 * Entry order determines leaf order; addresses must be unique.
 */
export function createDistribution(entries: AllocationEntry[]): Distribution {
  const seen = new Set<Address>()
  const normalized = entries.map((entry) => {
    const address = getAddress(entry.address)
    if (seen.has(address)) throw new Error(`Duplicate address: ${address}`)
    if (!isUint256(entry.amount)) throw new RangeError(`Amount out of uint256 range for ${address}`)
    seen.add(address)
    return { address, amount: entry.amount }
  })

  const tree = buildMerkleTree(normalized.map((e) => hashLeaf(e.address, e.amount)))

  const claims: Record<Address, DistributionClaim> = {}
  let total = 0n
  normalized.forEach((entry, index) => {
    claims[entry.address] = { index, amount: entry.amount.toString(), proof: tree.getProof(index) }
    total += entry.amount
  })

  return { merkleRoot: tree.root, tokenTotal: total.toString(), claims }
}
