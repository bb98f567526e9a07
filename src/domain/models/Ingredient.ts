export interface Ingredient {
  name: string
  quantity: number           // non-negative
  unit: string               // lowercase token, e.g. "g", "ml", "piece", "tablespoons"
}

export interface AggregatedIngredient {
  name: string               // normalized name (aggregation key)
  unit: string               // normalized unit (aggregation key)
  quantity: number           // sum over every occurrence in the plan
}

/** An entry in a meal: either already structured or a free-text line. */
export type IngredientEntry = string | Ingredient
