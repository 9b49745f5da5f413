export * from './types'
export { buildPolicy, assertPolicy, CorsConfigError, splitList, formatMaxAge } from './policy'
export type { CorsConfigErrorCode } from './policy'
export { matchOrigin, matchMethod, matchRequestHeaders, parseHeaderList } from './match'
export { evaluate, readRequestFacts } from './engine'
