import type { ErrorRequestHandler } from 'express'
import { ZodError } from 'zod'
import { logger } from '../services/observability'

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(400).json({ error: 'Invalid request', issues: err.issues })
  }
  // express.json() parse failures
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return res.status(400).json({ error: 'Malformed JSON body' })
  }

  logger.error('request_failed', { request_id: res.locals.requestId, method: req.method, path: req.path }, err)
  res.status(500).json({ error: 'Internal server error' })
}
