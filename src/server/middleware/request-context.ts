/**
 * cors-gate — request context middleware
 * Binds a correlation id to the request for every log line written while handling it,
 * and echoes it back as X-Request-Id.
 */

import type { Request, Response, NextFunction } from 'express'
import { getCorrelationId, runWithRequestContext } from '../../lib/logger'

export function requestContext() {
  return function (req: Request, res: Response, next: NextFunction) {
    runWithRequestContext({ headers: req.headers, bindings: { path: req.path } }, () => {
      const cid = getCorrelationId()
      if (cid) res.setHeader('X-Request-Id', cid)
      next()
    })
  }
}
