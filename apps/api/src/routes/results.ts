import type { Response } from 'express'
import type { AirdropEvent, ClaimReasonCode, ClaimResult } from '@dualdrop/claim-core'
import { claimsTotal } from '../services/observability'

export const REASON_STATUS: Record<ClaimReasonCode, number> = {
  AlreadyClaimed: 409,
  InvalidProof: 400,
  InvalidSignature: 401,
  RecipientMismatch: 400,
  SignaturesDisabled: 410,
  NotAuthorized: 403,
  PayoutFailed: 502,
  PayoutUnconfirmed: 504,
}

/** Counts the outcome and answers with the event, or the reason and its status. */
export function sendResult(res: Response, operation: string, result: ClaimResult<AirdropEvent>) {
  claimsTotal.inc({ operation, result: result.ok ? 'ok' : result.reason })
  if (!result.ok) {
    return res.status(REASON_STATUS[result.reason]).json({ error: result.reason })
  }
  return res.json({ event: result.event })
}
