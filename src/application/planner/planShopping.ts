import type { Ingredient } from '@domain/models/Ingredient.ts'
import type {
  RecipeShoppingPlanResult,
  ShoppingLineItem,
  ShoppingPlanResult,
  Suggestion,
} from '@domain/models/ShoppingPlan.ts'
import type { CollectedIngredients } from '@application/grocery/collectIngredients.ts'
import { collectMenuIngredients, collectRecipeIngredients } from '@application/grocery/collectIngredients.ts'
import { aggregateIngredients } from '@application/grocery/aggregateIngredients.ts'
import { resolveVendors } from '@application/pricing/lookupVendorPrices.ts'
import { buildShoppingList, type BuildShoppingListOptions } from '@application/shopping/buildShoppingList.ts'
import { evaluateBudget } from '@application/budget/evaluateBudget.ts'
import { DEFAULT_PLANNER_CONFIG, type PlannerConfig } from '@infrastructure/config/environment.ts'
import {
  recipeShoppingRequestSchema,
  weeklyShoppingRequestSchema,
  type RecipeShoppingRequest,
  type WeeklyShoppingRequest,
} from './shoppingPlan.schemas.ts'
import { ShoppingPlanValidationError } from './ShoppingPlanValidationError.ts'

export interface PlanShoppingOptions extends BuildShoppingListOptions {
  config?: PlannerConfig
}

interface PlanInputs {
  ingredients: Ingredient[]
  vendors: string[]
  budget: number
  currency: string | undefined
}

function warnUnparsed({ unparsedLines }: CollectedIngredients): void {
  if (unparsedLines.length === 0) return
  const sample = unparsedLines.slice(0, 5).map((line) => `"${line}"`).join(', ')
  console.warn(
    `[Basketwise] ${unparsedLines.length} ingredient line(s) could not be parsed and were counted as 1 piece: ${sample}`,
  )
}

/** Results are immutable all the way down: line items, their vendor options and suggestions. */
function freezePlanParts(items: ShoppingLineItem[], suggestions: Suggestion[]): void {
  for (const item of items) {
    item.storeOptions.forEach((option) => Object.freeze(option))
    Object.freeze(item.storeOptions)
    Object.freeze(item)
  }
  Object.freeze(items)
  suggestions.forEach((suggestion) => Object.freeze(suggestion))
  Object.freeze(suggestions)
}

/** Aggregate → price → evaluate. Pure apart from the fallback warning above. */
function buildPlan(inputs: PlanInputs, options: PlanShoppingOptions): ShoppingPlanResult {
  const config = options.config ?? DEFAULT_PLANNER_CONFIG
  const currency = inputs.currency?.toUpperCase() ?? config.currency
  const vendors = resolveVendors(inputs.vendors, config.defaultVendors)

  const aggregate = aggregateIngredients(inputs.ingredients)
  const { items, totalCost } = buildShoppingList(aggregate.values(), vendors, options)
  const evaluation = evaluateBudget(items, totalCost, inputs.budget, currency)
  freezePlanParts(items, evaluation.recipeChangeSuggestions)

  return Object.freeze({
    shoppingList: items,
    estimatedTotalCost: totalCost,
    currency,
    budget: inputs.budget,
    ...evaluation,
  })
}

/**
 * Build a priced shopping plan for a week of meals.
 *
 * The request is validated first: a missing days, meals or ingredients list,
 * a negative quantity or a non-finite budget throws
 * ShoppingPlanValidationError. Free-text lines inside meals are parsed
 * leniently and never fail.
 */
export function planWeeklyShopping(
  request: WeeklyShoppingRequest,
  options: PlanShoppingOptions = {},
): ShoppingPlanResult {
  const parsed = weeklyShoppingRequestSchema.safeParse(request)
  if (!parsed.success) throw ShoppingPlanValidationError.fromZodError(parsed.error)

  const { menu, vendors, budget, currency } = parsed.data
  const collected = collectMenuIngredients(menu)
  warnUnparsed(collected)

  return buildPlan({ ingredients: collected.ingredients, vendors, budget, currency }, options)
}

/**
 * Build a priced shopping plan for a single recipe whose ingredient lines
 * are grouped by section. Same validation rules as planWeeklyShopping.
 */
export function planRecipeShopping(
  request: RecipeShoppingRequest,
  options: PlanShoppingOptions = {},
): RecipeShoppingPlanResult {
  const parsed = recipeShoppingRequestSchema.safeParse(request)
  if (!parsed.success) throw ShoppingPlanValidationError.fromZodError(parsed.error)

  const { recipe, vendors, budget, currency } = parsed.data
  const collected = collectRecipeIngredients(recipe)
  warnUnparsed(collected)

  const plan = buildPlan({ ingredients: collected.ingredients, vendors, budget, currency }, options)
  return Object.freeze({ recipeName: recipe.recipeName ?? 'Unknown', ...plan })
}
