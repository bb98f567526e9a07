/** Wire shape of a shopping plan. Field names are the contract with display layers. */

export interface VendorOptionReport {
  vendor: string
  package_size: number
  package_unit: string
  price: number
}

export interface ShoppingLineItemReport {
  item: string
  category: string
  required_quantity: number
  unit: string
  store_options: VendorOptionReport[]
  chosen_store: string
  packages_needed: number
  chosen_price: number
  effective_cost: number
}

export interface SuggestionReport {
  impact: string
  category: string
  item: string
  description: string
  estimated_savings: number
}

export interface ShoppingPlanReport {
  shopping_list: ShoppingLineItemReport[]
  estimated_total_cost: number
  currency: string
  budget: number
  within_budget: boolean
  amount_over_budget: number
  recipe_change_suggestions: SuggestionReport[]
}

export interface RecipeShoppingPlanReport extends ShoppingPlanReport {
  recipe_name: string
}
