/**
 * Normalize an ingredient name for aggregation: lowercase and trim.
 * "Onion" and " onion " share a bucket, "onions" does not.
 */
export function normalizeIngredientName(name: string): string {
  return name.toLowerCase().trim()
}

/** Units get the same treatment as names so "G" and "g" share a bucket. */
export function normalizeUnit(unit: string): string {
  return unit.toLowerCase().trim()
}
