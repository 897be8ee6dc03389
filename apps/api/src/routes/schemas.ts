import { z } from 'zod'
import { getAddress, isAddress, isAddressEqual, isHex, zeroAddress, type Hex } from 'viem'

export const addressParam = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), { message: 'Expected a 20-byte hex address' })
  .transform((value) => getAddress(value))

const hex = z.string().refine((value): value is Hex => isHex(value, { strict: true }), {
  message: 'Expected 0x-prefixed hex',
})

// Decimal string for full uint256 range; plain numbers only while exact
const amount = z
  .union([z.string().regex(/^\d+$/, 'Expected a decimal integer'), z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)])
  .transform((value) => BigInt(value))

export const merkleClaimBody = z.object({
  proof: z.array(hex).max(256),
  to: addressParam,
  amount,
})

export const signatureClaimBody = z.object({
  signature: hex,
  to: addressParam,
  amount,
})

// Renouncing has its own route
export const transferOwnershipBody = z.object({
  newOwner: addressParam.refine((value) => !isAddressEqual(value, zeroAddress), {
    message: 'Use renounce-ownership to clear the owner',
  }),
})
