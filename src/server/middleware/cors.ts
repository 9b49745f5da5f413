/**
 * cors-gate — CORS middleware
 *
 * Runs the engine for each request and applies its decision:
 *  - writes the decision headers in order (Vary is appended, the rest are set)
 *  - `continue`  -> next()
 *  - `terminate` -> res.end() with no body; the status stays whatever the host
 *    defaults to (200 on Express), the engine never sets one
 *
 * Usage
 *   const policy = assertPolicy(corsConfig())
 *   app.use(corsGuard(policy))
 */

import { evaluate, readRequestFacts, type HeaderEntry, type PolicyConfig, type RequestReader } from '../../core/cors'
import { log, type Logger } from '../../lib/logger'

/** Write side of the host response. Express's Response satisfies it. */
export interface ResponseWriter {
  setHeader(name: string, value: string): unknown
  append(name: string, value: string): unknown
  end(): unknown
}

export type CorsHandler = (req: RequestReader, res: ResponseWriter, next: () => void) => void

export interface CorsGuardOptions {
  logger?: Logger
}

export function applyHeaders(res: ResponseWriter, headers: readonly HeaderEntry[]): void {
  for (const h of headers) {
    if (h.mode === 'append') res.append(h.name, h.value)
    else res.setHeader(h.name, h.value)
  }
}

export function corsGuard(policy: PolicyConfig, opts: CorsGuardOptions = {}): CorsHandler {
  const logger = opts.logger ?? log.child({ component: 'cors' })

  return function (req, res, next) {
    const facts = readRequestFacts(req)
    const decision = evaluate(policy, facts)

    applyHeaders(res, decision.headers)

    if (decision.outcome === 'continue') return next()

    logger.debug('cors request terminated', {
      verdict: decision.verdict,
      origin: facts.origin,
      method: facts.method,
      requested_method: facts.requestedMethod || undefined,
    })
    res.end()
  }
}
