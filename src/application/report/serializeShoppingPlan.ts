import type {
  RecipeShoppingPlanResult,
  ShoppingLineItem,
  ShoppingPlanResult,
  Suggestion,
  VendorOption,
} from '@domain/models/ShoppingPlan.ts'
import type {
  RecipeShoppingPlanReport,
  ShoppingLineItemReport,
  ShoppingPlanReport,
  SuggestionReport,
  VendorOptionReport,
} from '@domain/models/ShoppingPlanReport.ts'

function toVendorOptionReport(option: VendorOption): VendorOptionReport {
  return {
    vendor: option.vendor,
    package_size: option.packageSize,
    package_unit: option.packageUnit,
    price: option.price,
  }
}

function toLineItemReport(item: ShoppingLineItem): ShoppingLineItemReport {
  return {
    item: item.item,
    category: item.category,
    required_quantity: item.requiredQuantity,
    unit: item.unit,
    store_options: item.storeOptions.map(toVendorOptionReport),
    chosen_store: item.chosenStore,
    packages_needed: item.packagesNeeded,
    chosen_price: item.chosenPrice,
    effective_cost: item.effectiveCost,
  }
}

function toSuggestionReport(suggestion: Suggestion): SuggestionReport {
  return {
    impact: suggestion.impact,
    category: suggestion.category,
    item: suggestion.item,
    description: suggestion.description,
    estimated_savings: suggestion.estimatedSavings,
  }
}

/** Convert a plan to its JSON wire shape (snake_case field names). */
export function toShoppingPlanReport(result: ShoppingPlanResult): ShoppingPlanReport {
  return {
    shopping_list: result.shoppingList.map(toLineItemReport),
    estimated_total_cost: result.estimatedTotalCost,
    currency: result.currency,
    budget: result.budget,
    within_budget: result.withinBudget,
    amount_over_budget: result.amountOverBudget,
    recipe_change_suggestions: result.recipeChangeSuggestions.map(toSuggestionReport),
  }
}

export function toRecipeShoppingPlanReport(result: RecipeShoppingPlanResult): RecipeShoppingPlanReport {
  return { recipe_name: result.recipeName, ...toShoppingPlanReport(result) }
}
