import { createLogger } from '@dualdrop/observability'
import { Airdrop, InMemoryTokenLedger, type AirdropOptions } from '@dualdrop/claim-core'

// Placeholder keys; the addresses below are derived from them.
export const KEYS = {
  alice: '0x0303030303030303030303030303030303030303030303030303030303030303',
  mallory: '0x0505050505050505050505050505050505050505050505050505050505050505',
} as const

export const ADDRESSES = {
  owner: '0x1a642f0E3c3aF545E7AcBD38b07251B3990914F1',
  signer: '0x5050A4F4b3f9338C3472dcC01A87C76A144b3c9c',
  alice: '0x3325a78425F17a7E487Eb5666b2bFd93aBb06c70',
  bob: '0xc48B812bB43401392c037381AcA934F4069C0517',
  mallory: '0xd09Ad14080d4b257a819a4f579b8485Be88f086c',
  contract: '0x000000000000000000000000000000000000A1D0',
} as const

/** ADDRESSES.alice and ADDRESSES.contract without checksum casing. */
export const ALICE_LOWER = '0x3325a78425f17a7e487eb5666b2bfd93abb06c70'
export const CONTRACT_LOWER = '0x000000000000000000000000000000000000a1d0'

export const TOKEN = '0x0000000000000000000000000000000000001234'
export const CHAIN_ID = 31337
export const JWT_SECRET = 'test-secret-test-secret'

// Tree over (alice, 1e18) and (bob, 5e18)
export const LEAF_ALICE = '0x5efd9c308b1e38f431a07171bb59f97f9db2ff6e9f1120c2628806ad35c0dd4a'
export const LEAF_BOB = '0x1fe17c96c142550a7b5e88635b7973d082eaf8659c73c0cd6af3d143f30da4cd'
export const ROOT = '0xba4b73c4143252b5a41a9cad3a2b4bd208b743421d66598d7f4f055a1f337f96'
export const DOMAIN_SEPARATOR = '0x75751c9f429be935ea619dbb589f7ac940a10d583a750009a3a0c8627b3cb3b3'
/** Trusted signer's voucher for (alice, 1e18). */
export const SIG_ALICE =
  '0xf973a0b87062c389d125d8199e803b832b6ac6bf7867a4f6cd87506060fc4c585584e0c117354e602f41f3fe33d8ee449d9a06742179067a354cb14bba28011d1c'

export const ONE_TOKEN = '1000000000000000000'
export const FIVE_TOKENS = '5000000000000000000'

export function makeAirdrop(overrides: Partial<AirdropOptions> = {}, poolFunds = 100n * 10n ** 18n) {
  const ledger = new InMemoryTokenLedger(TOKEN, ADDRESSES.contract)
  ledger.mint(ADDRESSES.contract, poolFunds)
  const airdrop = new Airdrop({
    config: {
      merkleRoot: ROOT,
      trustedSigner: ADDRESSES.signer,
      chainId: CHAIN_ID,
      verifyingContract: ADDRESSES.contract,
    },
    payoutToken: ledger,
    owner: ADDRESSES.owner,
    logger: createLogger({}, { level: 'silent' }),
    ...overrides,
  })
  return { airdrop, ledger }
}
