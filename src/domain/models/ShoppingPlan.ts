import type { Category } from '@domain/constants/categories.ts'

export interface VendorOption {
  vendor: string
  packageSize: number
  packageUnit: string
  price: number
}

export interface ShoppingLineItem {
  item: string
  category: Category
  requiredQuantity: number
  unit: string
  storeOptions: VendorOption[]
  chosenStore: string
  packagesNeeded: number
  chosenPrice: number
  effectiveCost: number      // packagesNeeded * chosenPrice
}

export type SuggestionImpact = 'critical' | 'high' | 'medium' | 'low'

export interface Suggestion {
  impact: SuggestionImpact
  category: Category | 'budget'
  item: string
  description: string
  estimatedSavings: number
}

export interface BudgetEvaluation {
  withinBudget: boolean
  amountOverBudget: number
  recipeChangeSuggestions: Suggestion[]
}

export interface ShoppingPlanResult extends BudgetEvaluation {
  shoppingList: ShoppingLineItem[]
  estimatedTotalCost: number
  currency: string
  budget: number
}

export interface RecipeShoppingPlanResult extends ShoppingPlanResult {
  recipeName: string
}
