/**
 * Fixed vectors for the frozen encodings, computed independently of this
 * package. Keys are placeholders, not funded anywhere.
 */

import type { Address, Hex } from '../types'

export const KEYS = {
  owner: '0x0101010101010101010101010101010101010101010101010101010101010101',
  signer: '0x0202020202020202020202020202020202020202020202020202020202020202',
  alice: '0x0303030303030303030303030303030303030303030303030303030303030303',
  bob: '0x0404040404040404040404040404040404040404040404040404040404040404',
  mallory: '0x0505050505050505050505050505050505050505050505050505050505050505',
} as const satisfies Record<string, Hex>

export const ADDRESSES = {
  owner: '0x1a642f0E3c3aF545E7AcBD38b07251B3990914F1',
  signer: '0x5050A4F4b3f9338C3472dcC01A87C76A144b3c9c',
  alice: '0x3325a78425F17a7E487Eb5666b2bFd93aBb06c70',
  bob: '0xc48B812bB43401392c037381AcA934F4069C0517',
  mallory: '0xd09Ad14080d4b257a819a4f579b8485Be88f086c',
  contract: '0x000000000000000000000000000000000000A1D0',
} as const satisfies Record<string, Address>

/** The same identity as ADDRESSES.alice, without the checksum casing. */
export const ALICE_LOWER: Address = '0x3325a78425f17a7e487eb5666b2bfd93abb06c70'

export const CHAIN_ID = 31337
export const ONE = 10n ** 18n

export const VECTORS = {
  leafAlice: '0x5efd9c308b1e38f431a07171bb59f97f9db2ff6e9f1120c2628806ad35c0dd4a',
  leafBob: '0x1fe17c96c142550a7b5e88635b7973d082eaf8659c73c0cd6af3d143f30da4cd',
  leafMallory: '0x4a6c8f5230b034e2fac28ff24c7e81c8ac27926f91a4b525b72c9fadf56bc929',
  root2: '0xba4b73c4143252b5a41a9cad3a2b4bd208b743421d66598d7f4f055a1f337f96',
  root3promote: '0x7a5e003e0741e698b124da62717a801f81ebba9833ab2be1462f46901e5a2038',
  root3dup: '0x3e843b6077cf3f370c55c1747bb29fd0dee7800daa6751e8c029b438b707040b',
  claimTypeHash: '0x3da9d90d850809a0fe09f883af680b07dd37fdae47d9dd160e7ddbb58addcf54',
  domainSeparator: '0x75751c9f429be935ea619dbb589f7ac940a10d583a750009a3a0c8627b3cb3b3',
  domainSeparatorChain1: '0xeaba0072c44eb79368b6fde0a8cf4fef4625060befe065ecb30cda38e1255667',
  structHashAlice: '0x7adb3eed2478b03a5c17427617242564d3057375245643832fc2c17c5adf44eb',
  digestAlice: '0xcd8775f2cf0a0042376bf03b173b936407f49c7b12907f24df5647d05cd0cb14',
  sigAliceBySigner: '0xf973a0b87062c389d125d8199e803b832b6ac6bf7867a4f6cd87506060fc4c585584e0c117354e602f41f3fe33d8ee449d9a06742179067a354cb14bba28011d1c',
  sigAliceByMallory: '0x0fd109be4a9e07d64737926c7e2d8d7afa63ec5991d126b8abe7919d3c62a7be5522d4dc9cad77eadb7af839a493e45f4f22c756892275f44d3a4dcbc4799d0f1b',
  digestBob: '0x9391bcb2152bcbf953b7ded4e9b193e55780ce69852f7f688124f40a0643e1db',
  sigBobBySigner: '0x34f3a258f77eff6555b846d2a1341762ec29eb59587c59af6061df28b6d18faf38eb3e59fc136313a01fbd81d6ad02e77e248a1e9d815050abbd7b8da3a886981c',
} as const satisfies Record<string, Hex>
