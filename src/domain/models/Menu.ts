import type { IngredientEntry } from './Ingredient.ts'

export interface Meal {
  type?: string              // breakfast, lunch, dinner, ...
  name?: string
  servings?: number
  ingredients: IngredientEntry[]
}

export interface DayPlan {
  day: number                // 1..7
  meals: Meal[]
}

/** A week of planned meals as produced by the menu generator. */
export interface Menu {
  days: DayPlan[]
}

/**
 * A single recipe whose ingredient lines are grouped into named sections,
 * e.g. { "For the Sauce": ["2 tablespoons olive oil", "1 onion, chopped"] }.
 */
export interface RecipeIngredients {
  recipeName?: string
  ingredients: Record<string, string[]>
}
