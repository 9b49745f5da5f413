import { describe, expect, it } from 'vitest'

import { DEFAULT_CORS_CONFIG } from '../../../lib/constants'
import { assertPolicy, buildPolicy, CorsConfigError, formatMaxAge, splitList } from '../policy'

describe('buildPolicy', () => {
  it('should normalize the default configuration', () => {
    const res = buildPolicy({ ...DEFAULT_CORS_CONFIG })
    if (!res.ok) throw res.error

    expect(res.value).toEqual({
      allowAllOrigins: true,
      origins: new Set(),
      methods: ['GET', 'PUT', 'POST', 'DELETE'],
      methodsHeader: 'GET, PUT, POST, DELETE',
      requestHeaders: ['origin', 'authorization', 'content-type'],
      requestHeadersHeader: 'Origin, Authorization, Content-Type',
      exposedHeaders: '',
      maxAgeSeconds: '60',
      credentialsEnabled: true,
      credentials: 'true',
      validateHeaders: false,
    })
  })

  it('should freeze the policy and its lists', () => {
    const policy = assertPolicy({ ...DEFAULT_CORS_CONFIG })
    expect(Object.isFrozen(policy)).toBe(true)
    expect(Object.isFrozen(policy.methods)).toBe(true)
    expect(Object.isFrozen(policy.requestHeaders)).toBe(true)
  })

  it('should collect listed origins', () => {
    const policy = assertPolicy({ ...DEFAULT_CORS_CONFIG, origins: 'https://a.com, https://b.com' })
    expect(policy.allowAllOrigins).toBe(false)
    expect(Array.from(policy.origins)).toEqual(['https://a.com', 'https://b.com'])
  })

  it('should only treat a lone * as the wildcard', () => {
    const policy = assertPolicy({ ...DEFAULT_CORS_CONFIG, origins: 'https://a.com, *' })
    expect(policy.allowAllOrigins).toBe(false)
    expect(policy.origins.has('*')).toBe(true)
  })

  it('should render credentials as text', () => {
    const policy = assertPolicy({ ...DEFAULT_CORS_CONFIG, credentials: false })
    expect(policy.credentialsEnabled).toBe(false)
    expect(policy.credentials).toBe('false')
  })

  it.each(['', '   '])('should reject an empty origin rule (%j)', (origins) => {
    const res = buildPolicy({ ...DEFAULT_CORS_CONFIG, origins })
    expect(res.ok).toBe(false)
    if (res.ok) return
    expect(res.error).toBeInstanceOf(CorsConfigError)
    expect(res.error.code).toBe('EMPTY_ORIGINS')
  })

  it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])('should reject max age %s', (maxAgeMs) => {
    const res = buildPolicy({ ...DEFAULT_CORS_CONFIG, maxAgeMs })
    expect(res.ok).toBe(false)
    if (res.ok) return
    expect(res.error.code).toBe('INVALID_MAX_AGE')
  })
})

describe('assertPolicy', () => {
  it('should throw the configuration error', () => {
    expect(() => assertPolicy({ ...DEFAULT_CORS_CONFIG, origins: '' })).toThrow(CorsConfigError)
  })
})

describe('splitList', () => {
  it('should split on comma-space and trim tokens', () => {
    expect(splitList('GET, POST,  PUT , ')).toEqual(['GET', 'POST', 'PUT'])
  })

  it('should not split on a bare comma', () => {
    expect(splitList('GET,POST')).toEqual(['GET,POST'])
  })
})

describe('formatMaxAge', () => {
  it.each([
    [0, '0'],
    [400, '0'],
    [1_000, '1'],
    [1_500, '2'],
    [2_500, '2'],
    [2_600, '3'],
    [60_000, '60'],
    [3_600_000, '3600'],
  ])('should render %d ms as %s', (ms, expected) => {
    expect(formatMaxAge(ms)).toBe(expected)
  })

  it('should render very large values in plain digits', () => {
    // 2^70 seconds, exactly representable
    expect(formatMaxAge(2 ** 70 * 1000)).toBe('1180591620717411303424')
  })
})
