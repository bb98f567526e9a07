import type { BudgetEvaluation, ShoppingLineItem, Suggestion } from '@domain/models/ShoppingPlan.ts'
import { MAX_SUGGESTIONS, SAVINGS_RULES, SUMMARY_SUGGESTION_ITEM } from '@domain/constants/budget.ts'
import { roundCurrency } from '@application/pricing/lookupVendorPrices.ts'

/** Suggestion for one line item, or null when it is below every threshold. */
export function suggestSavings(item: ShoppingLineItem): Suggestion | null {
  const cost = item.effectiveCost
  const rule = SAVINGS_RULES.find(
    (r) => (r.category === null || r.category === item.category) && cost > r.minCost,
  )
  if (!rule) return null

  return {
    impact: rule.impact,
    category: item.category,
    item: item.item,
    description: rule.describe(item.item),
    estimatedSavings: roundCurrency(rule.savingsRate * cost),
  }
}

/**
 * Compare the plan's cost with the budget. Over budget, the most expensive
 * items are turned into up to MAX_SUGGESTIONS savings suggestions, preceded
 * by a critical summary carrying the overage and the combined savings.
 */
export function evaluateBudget(
  shoppingList: readonly ShoppingLineItem[],
  totalCost: number,
  budget: number,
  currency = 'INR',
): BudgetEvaluation {
  const withinBudget = totalCost <= budget
  const amountOverBudget = Math.max(0, totalCost - budget)

  if (withinBudget) {
    return { withinBudget, amountOverBudget, recipeChangeSuggestions: [] }
  }

  const byCost = [...shoppingList].sort((a, b) => b.effectiveCost - a.effectiveCost)
  const itemSuggestions: Suggestion[] = []
  for (const item of byCost) {
    if (itemSuggestions.length >= MAX_SUGGESTIONS) break
    const suggestion = suggestSavings(item)
    if (suggestion) itemSuggestions.push(suggestion)
  }

  const totalSavings = itemSuggestions.reduce((sum, s) => sum + s.estimatedSavings, 0)
  const summary: Suggestion = {
    impact: 'critical',
    category: 'budget',
    item: SUMMARY_SUGGESTION_ITEM,
    description: `You are ${currency} ${roundCurrency(amountOverBudget)} over budget. Consider implementing the suggestions below to reduce costs.`,
    estimatedSavings: roundCurrency(totalSavings),
  }

  return {
    withinBudget,
    amountOverBudget,
    recipeChangeSuggestions: [summary, ...itemSuggestions],
  }
}
