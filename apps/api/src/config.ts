import { ZodError, z } from 'zod'
import { getAddress, isAddress, isHex, size, type Hex } from 'viem'
import { isLogThreshold, type LogThreshold } from '@dualdrop/observability'

const address = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), { message: 'Expected a 20-byte hex address' })
  .transform((value) => getAddress(value))

const bytes32 = z
  .string()
  .refine((value): value is Hex => isHex(value, { strict: true }) && size(value) === 32, {
    message: 'Expected a 32-byte hex value',
  })

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1')

const configSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(3001),
    CORS_ORIGIN: z.string().optional(),
    LOG_LEVEL: z
      .string()
      .default('info')
      .transform((value) => value.toLowerCase())
      .refine((value): value is LogThreshold => isLogThreshold(value), { message: 'Unknown log level' }),

    // Airdrop instance
    MERKLE_ROOT: bytes32,
    TRUSTED_SIGNER: address,
    OWNER_ADDRESS: address,
    CHAIN_ID: z.coerce.number().int().positive(),
    AIRDROP_ADDRESS: address,
    STRICT_SIGNATURE_RECIPIENT: flag,

    // Claim record; in-memory when unset
    DATABASE_URL: z.string().url().optional(),

    // ERC-20 payout; in-memory ledger when unset
    RPC_URL: z.string().url().optional(),
    PAYOUT_TOKEN_ADDRESS: address.optional(),
    PAYOUT_PRIVATE_KEY: bytes32.optional(),

    // Auth
    JWT_SECRET: z.string().min(16),
    TRUST_WALLET_HEADER: flag,

    // Claim and admin requests per wallet per minute
    CLAIM_RATE_LIMIT: z.coerce.number().int().positive().default(5),
  })
  .superRefine((env, ctx) => {
    const payout = [env.RPC_URL, env.PAYOUT_TOKEN_ADDRESS, env.PAYOUT_PRIVATE_KEY]
    const given = payout.filter((value) => value !== undefined).length
    if (given > 0 && given < payout.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PAYOUT_TOKEN_ADDRESS'],
        message: 'RPC_URL, PAYOUT_TOKEN_ADDRESS and PAYOUT_PRIVATE_KEY must be set together',
      })
    }
    if (env.TRUST_WALLET_HEADER && env.NODE_ENV === 'production') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TRUST_WALLET_HEADER'],
        message: 'The wallet header cannot be trusted in production',
      })
    }
  })

export type ApiConfig = z.infer<typeof configSchema>

export class ConfigValidationError extends Error {
  readonly missing: string[]
  readonly invalid: string[]

  constructor(error: ZodError) {
    const missing: string[] = []
    const invalid: string[] = []
    for (const issue of error.issues) {
      const key = issue.path.join('.')
      if (issue.code === 'invalid_type' && issue.received === 'undefined') missing.push(key)
      else invalid.push(key)
    }
    super(`Invalid API config: ${JSON.stringify({ missing, invalid })}`)
    this.name = 'ConfigValidationError'
    this.missing = missing
    this.invalid = invalid
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  try {
    return configSchema.parse(env)
  } catch (err) {
    if (err instanceof ZodError) throw new ConfigValidationError(err)
    throw err
  }
}
