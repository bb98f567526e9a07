import type { AggregatedIngredient, Ingredient } from '@domain/models/Ingredient.ts'
import { normalizeIngredientName, normalizeUnit } from './normalizeIngredientName.ts'

/** Bucket key for a (name, unit) pair. Units are never converted. */
export function aggregateKey(name: string, unit: string): string {
  return `${normalizeIngredientName(name)}|${normalizeUnit(unit)}`
}

/**
 * Sum ingredient quantities by normalized (name, unit). The same name in
 * two units stays as two entries. Map order is first-seen order and only
 * matters for display.
 */
export function aggregateIngredients(ingredients: Iterable<Ingredient>): Map<string, AggregatedIngredient> {
  const buckets = new Map<string, AggregatedIngredient>()

  for (const ing of ingredients) {
    const key = aggregateKey(ing.name, ing.unit)
    const existing = buckets.get(key)

    if (existing) {
      existing.quantity += ing.quantity
    } else {
      buckets.set(key, {
        name: normalizeIngredientName(ing.name),
        unit: normalizeUnit(ing.unit),
        quantity: ing.quantity,
      })
    }
  }

  return buckets
}
