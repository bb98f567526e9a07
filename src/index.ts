export type { AggregatedIngredient, Ingredient, IngredientEntry } from '@domain/models/Ingredient.ts'
export type { DayPlan, Meal, Menu, RecipeIngredients } from '@domain/models/Menu.ts'
export type {
  BudgetEvaluation,
  RecipeShoppingPlanResult,
  ShoppingLineItem,
  ShoppingPlanResult,
  Suggestion,
  SuggestionImpact,
  VendorOption,
} from '@domain/models/ShoppingPlan.ts'
export type { RecipeShoppingPlanReport, ShoppingPlanReport } from '@domain/models/ShoppingPlanReport.ts'
export { CATEGORIES, CATEGORY_KEYWORDS, lookupCategory, type Category } from '@domain/constants/categories.ts'
export { CATEGORY_PRICING, DEFAULT_VENDORS, MAX_VENDORS } from '@domain/constants/pricing.ts'
export { MAX_SUGGESTIONS, SAVINGS_RULES } from '@domain/constants/budget.ts'
export { parseIngredient, parseIngredientLine, parseIngredients } from '@application/parser/IngredientParser.ts'
export { aggregateIngredients, aggregateKey } from '@application/grocery/aggregateIngredients.ts'
export { collectMenuIngredients, collectRecipeIngredients } from '@application/grocery/collectIngredients.ts'
export { lookupVendorPrices, type PriceLookup } from '@application/pricing/lookupVendorPrices.ts'
export { buildShoppingList, selectCheapestOption } from '@application/shopping/buildShoppingList.ts'
export { evaluateBudget } from '@application/budget/evaluateBudget.ts'
export { planRecipeShopping, planWeeklyShopping, type PlanShoppingOptions } from '@application/planner/planShopping.ts'
export type { RecipeShoppingRequest, WeeklyShoppingRequest } from '@application/planner/shoppingPlan.schemas.ts'
export { ShoppingPlanValidationError } from '@application/planner/ShoppingPlanValidationError.ts'
export { toRecipeShoppingPlanReport, toShoppingPlanReport } from '@application/report/serializeShoppingPlan.ts'
export { DEFAULT_PLANNER_CONFIG, loadPlannerConfig, type PlannerConfig } from '@infrastructure/config/environment.ts'
