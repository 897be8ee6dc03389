import { createLogger, createMetricsRegistry } from '@dualdrop/observability'

export const logger = createLogger({ service: 'api' })
export const metrics = createMetricsRegistry()

export const claimsTotal = metrics.counter(
  'airdrop_claims_total',
  'Claim and admin outcomes by path and result (ok or rejection reason)',
)
export const payoutLatencyMs = metrics.histogram(
  'airdrop_payout_latency_ms',
  'Latency of payout transfers',
  'ms',
)
export const payoutFailuresTotal = metrics.counter(
  'airdrop_payout_failures_total',
  'Payout transfers that returned false or threw',
)
