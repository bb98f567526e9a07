import unitTokens from './units.json'

/**
 * Single-word unit tokens recognized after a leading quantity, in lowercase.
 * Tokens are kept as written; there is no conversion between units.
 */
export const UNIT_TOKENS: ReadonlySet<string> = new Set(unitTokens)

/** Unit used when a line carries no recognizable unit. */
export const DEFAULT_UNIT = 'piece'

export function isUnitToken(token: string): boolean {
  return UNIT_TOKENS.has(token.toLowerCase())
}
