import { isUnitToken } from '@domain/constants/units.ts'

export interface UnitResult {
  unit: string | null
  remainder: string
}

/**
 * Take a single-word unit token from the front of a string. The token is
 * returned lowercased but otherwise as written ("Tablespoons" → "tablespoons").
 * A unit is only taken when something follows it, so "2 cups" keeps "cups"
 * as the item name.
 */
export function parseUnit(text: string): UnitResult {
  const trimmed = text.trim()
  const match = trimmed.match(/^([A-Za-z]+)\.?\s+(\S.*)$/)
  if (!match || !isUnitToken(match[1])) {
    return { unit: null, remainder: trimmed }
  }
  return { unit: match[1].toLowerCase(), remainder: match[2] }
}
