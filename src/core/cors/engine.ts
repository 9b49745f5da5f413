/**
 * cors-gate — engine.ts
 * The per-request CORS decision. Pure: the same policy and facts always give the same
 * decision, and the host applies the returned headers and outcome.
 *
 *   no Origin        -> continue, Vary only
 *   origin refused   -> terminate, Vary only
 *   preflight        -> terminate, allow headers when the request validates
 *   simple / actual  -> continue, expose + allow-origin (+ credentials)
 */

import {
  ALLOW_CREDENTIALS,
  ALLOW_HEADERS,
  ALLOW_METHODS,
  ALLOW_ORIGIN,
  EXPOSE_HEADERS,
  MAX_AGE,
  OPTIONS_METHOD,
  ORIGIN,
  REQUEST_HEADERS,
  REQUEST_METHOD,
  VARY,
  WILDCARD_ORIGIN,
} from '../../lib/constants'
import { matchMethod, matchOrigin, matchRequestHeaders } from './match'
import type {
  CorsDecision,
  CorsVerdict,
  HeaderEntry,
  PolicyConfig,
  RequestFacts,
  RequestReader,
} from './types'

export function readRequestFacts(req: RequestReader): RequestFacts {
  const requestedMethod = req.header(REQUEST_METHOD) ?? ''
  return {
    origin: req.header(ORIGIN) ?? '',
    method: req.method,
    // Bare OPTIONS without Access-Control-Request-Method is an ordinary request
    isPreflight: req.method === OPTIONS_METHOD && requestedMethod !== '',
    requestedMethod,
    requestedHeaders: req.header(REQUEST_HEADERS) ?? '',
  }
}

function set(name: string, value: string): HeaderEntry {
  return { name, value, mode: 'set' }
}

function terminate(verdict: CorsVerdict, headers: HeaderEntry[]): CorsDecision {
  return { outcome: 'terminate', verdict, headers }
}

function preflight(policy: PolicyConfig, facts: RequestFacts, headers: HeaderEntry[]): CorsDecision {
  if (policy.validateHeaders) {
    if (!matchMethod(facts.requestedMethod, policy.methods)) {
      return terminate('preflight-method-rejected', headers)
    }
    if (!matchRequestHeaders(facts.requestedHeaders, policy.requestHeaders)) {
      return terminate('preflight-headers-rejected', headers)
    }
  }

  headers.push(set(ALLOW_METHODS, policy.methodsHeader))
  headers.push(set(ALLOW_HEADERS, policy.requestHeadersHeader))
  if (policy.maxAgeSeconds !== '0') {
    headers.push(set(MAX_AGE, policy.maxAgeSeconds))
  }

  return terminate('preflight-accepted', headers)
}

export function evaluate(policy: PolicyConfig, facts: RequestFacts): CorsDecision {
  // Vary goes out on every path, ahead of the Origin check
  const headers: HeaderEntry[] = [{ name: VARY, value: ORIGIN, mode: 'append' }]

  if (!facts.origin) {
    return { outcome: 'continue', verdict: 'not-cors', headers }
  }

  if (!policy.allowAllOrigins && !matchOrigin(facts.origin, policy.origins)) {
    return terminate('origin-rejected', headers)
  }

  if (facts.isPreflight) {
    return preflight(policy, facts, headers)
  }

  if (policy.exposedHeaders) {
    headers.push(set(EXPOSE_HEADERS, policy.exposedHeaders))
  }

  if (policy.credentialsEnabled) {
    // "*" is never paired with credentials
    headers.push(set(ALLOW_CREDENTIALS, policy.credentials))
    headers.push(set(ALLOW_ORIGIN, facts.origin))
  } else if (policy.allowAllOrigins) {
    headers.push(set(ALLOW_ORIGIN, WILDCARD_ORIGIN))
  } else {
    headers.push(set(ALLOW_ORIGIN, facts.origin))
  }

  return { outcome: 'continue', verdict: 'allowed', headers }
}
