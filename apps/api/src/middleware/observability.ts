import { randomUUID } from 'node:crypto'
import type { NextFunction, Request, Response } from 'express'
import { logger } from '../services/observability'

export function observabilityMiddleware(req: Request, res: Response, next: NextFunction) {
  const requestId = req.header('X-Request-Id') || randomUUID()
  const startedAt = Date.now()

  res.locals.requestId = requestId
  res.setHeader('X-Request-Id', requestId)

  logger.info('request_started', {
    request_id: requestId,
    method: req.method,
    path: req.path,
  })

  res.on('finish', () => {
    logger.info('request_finished', {
      request_id: requestId,
      method: req.method,
      path: req.path,
      status_code: res.statusCode,
      duration_ms: Date.now() - startedAt,
      wallet: req.wallet,
    })
  })

  next()
}
