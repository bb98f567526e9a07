import type { Ingredient } from '@domain/models/Ingredient.ts'
import { DEFAULT_UNIT } from '@domain/constants/units.ts'
import { normalizeUnicodeFractions, parseQuantity } from './parseQuantity.ts'
import { parseUnit } from './parseUnit.ts'

export interface ParsedLine {
  ingredient: Ingredient
  /** false when the line fell back to "whole text, 1 piece". */
  matched: boolean
}

/**
 * Normalize whitespace and unicode fractions in raw ingredient text.
 */
function normalize(raw: string): string {
  return normalizeUnicodeFractions(raw.trim()).replace(/\s+/g, ' ')
}

/** Drop descriptive suffixes: "onion, finely chopped" → "onion". */
function stripDescription(name: string): string {
  return name.split(',')[0].trim()
}

function fallback(text: string): ParsedLine {
  const name = stripDescription(text) || text
  return { ingredient: { name, quantity: 1, unit: DEFAULT_UNIT }, matched: false }
}

/**
 * Parse a raw ingredient line and report whether the structured pattern matched.
 *
 * Pipeline:
 * 1. Normalize whitespace + unicode fractions
 * 2. Parse quantity from front
 * 3. Parse unit from front of remainder
 * 4. Cut the name at the first comma
 *
 * Anything that does not yield a positive quantity and a non-empty name
 * degrades to quantity 1, unit "piece", whole line as name.
 */
export function parseIngredientLine(raw: string): ParsedLine {
  const normalized = normalize(raw)

  const { qty, remainder: afterQty } = parseQuantity(normalized)
  if (qty === null) return fallback(normalized)

  const { unit, remainder: afterUnit } = parseUnit(afterQty)
  const name = stripDescription(afterUnit)
  if (!name) return fallback(normalized)

  return {
    ingredient: { name, quantity: qty, unit: unit ?? DEFAULT_UNIT },
    matched: true,
  }
}

/** Parse a raw ingredient string into a structured Ingredient. Never throws. */
export function parseIngredient(raw: string): Ingredient {
  return parseIngredientLine(raw).ingredient
}

/** Parse an array of raw ingredient strings. */
export function parseIngredients(rawList: string[]): Ingredient[] {
  return rawList.map(parseIngredient)
}
