import type { Category } from './categories.ts'
import type { SuggestionImpact } from '@domain/models/ShoppingPlan.ts'

export interface SavingsRule {
  /** null matches any category. */
  category: Category | null
  /** Suggest only when the item's effective cost is strictly above this. */
  minCost: number
  savingsRate: number
  impact: Exclude<SuggestionImpact, 'critical'>
  describe: (item: string) => string
}

/** Tested in order; the first matching rule produces the item's suggestion. */
export const SAVINGS_RULES: readonly SavingsRule[] = [
  {
    category: 'dairy',
    minCost: 100,
    savingsRate: 0.4,
    impact: 'high',
    describe: (item) =>
      `Consider reducing '${item}' quantity or using a cheaper alternative like plant-based options.`,
  },
  {
    category: 'protein',
    minCost: 150,
    savingsRate: 0.5,
    impact: 'high',
    describe: (item) =>
      `Replace '${item}' with more economical protein sources like lentils, chickpeas, or eggs.`,
  },
  {
    category: 'vegetables',
    minCost: 80,
    savingsRate: 0.25,
    impact: 'medium',
    describe: (item) => `Buy '${item}' from local markets instead of premium stores for better prices.`,
  },
  {
    category: 'grains',
    minCost: 100,
    savingsRate: 0.3,
    impact: 'medium',
    describe: (item) => `Purchase '${item}' in bulk quantities to reduce per-unit cost.`,
  },
  {
    category: null,
    minCost: 50,
    savingsRate: 0.2,
    impact: 'low',
    describe: (item) => `Consider reducing '${item}' quantity or finding cheaper alternatives.`,
  },
]

/** Per-item suggestions emitted when over budget, not counting the summary. */
export const MAX_SUGGESTIONS = 5

export const SUMMARY_SUGGESTION_ITEM = 'Overall Budget'
