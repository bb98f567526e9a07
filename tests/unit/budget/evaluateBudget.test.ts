import { describe, it, expect } from 'vitest'
import { evaluateBudget, suggestSavings } from '@application/budget/evaluateBudget.ts'
import type { ShoppingLineItem } from '@domain/models/ShoppingPlan.ts'

function makeItem(overrides: Partial<ShoppingLineItem>): ShoppingLineItem {
  return {
    item: 'test item',
    category: 'other',
    requiredQuantity: 1,
    unit: 'piece',
    storeOptions: [],
    chosenStore: 'VendorA',
    packagesNeeded: 1,
    chosenPrice: 0,
    effectiveCost: 0,
    ...overrides,
  }
}

describe('evaluateBudget', () => {
  it('reports no suggestions within budget', () => {
    const result = evaluateBudget([makeItem({ effectiveCost: 150 })], 150, 1000)

    expect(result).toEqual({ withinBudget: true, amountOverBudget: 0, recipeChangeSuggestions: [] })
  })

  it('treats a total equal to the budget as within budget', () => {
    expect(evaluateBudget([], 200, 200).withinBudget).toBe(true)
  })

  it('leads with a critical summary when over budget', () => {
    const result = evaluateBudget([makeItem({ item: 'paneer', category: 'dairy', effectiveCost: 150 })], 150, 100)

    expect(result.withinBudget).toBe(false)
    expect(result.amountOverBudget).toBe(50)
    expect(result.recipeChangeSuggestions).toEqual([
      {
        impact: 'critical',
        category: 'budget',
        item: 'Overall Budget',
        description: 'You are INR 50 over budget. Consider implementing the suggestions below to reduce costs.',
        estimatedSavings: 60,
      },
      {
        impact: 'high',
        category: 'dairy',
        item: 'paneer',
        description: "Consider reducing 'paneer' quantity or using a cheaper alternative like plant-based options.",
        estimatedSavings: 60,
      },
    ])
  })

  it('orders item suggestions by cost and sums their savings', () => {
    const items = [
      makeItem({ item: 'cheese', category: 'dairy', effectiveCost: 200 }),
      makeItem({ item: 'jaggery', effectiveCost: 30 }),
      makeItem({ item: 'chicken', category: 'protein', effectiveCost: 300 }),
    ]

    const [summary, ...rest] = evaluateBudget(items, 530, 400).recipeChangeSuggestions

    expect(rest.map((s) => s.item)).toEqual(['chicken', 'cheese'])
    expect(rest.map((s) => s.estimatedSavings)).toEqual([150, 80])
    expect(summary.estimatedSavings).toBe(230)
  })

  it('caps item suggestions at five and skips items below every threshold', () => {
    const items = [
      ...Array.from({ length: 7 }, (_, i) => makeItem({ item: `item ${i}`, effectiveCost: 60 })),
      makeItem({ item: 'cheap', effectiveCost: 10 }),
    ]

    const suggestions = evaluateBudget(items, 430, 0).recipeChangeSuggestions

    expect(suggestions).toHaveLength(6)
    expect(suggestions.slice(1).map((s) => s.item)).toEqual(['item 0', 'item 1', 'item 2', 'item 3', 'item 4'])
    expect(suggestions[0].estimatedSavings).toBe(60)
  })

  it('still summarizes when no item qualifies', () => {
    const suggestions = evaluateBudget([makeItem({ effectiveCost: 10 })], 10, -5).recipeChangeSuggestions

    expect(suggestions).toHaveLength(1)
    expect(suggestions[0].impact).toBe('critical')
    expect(suggestions[0].estimatedSavings).toBe(0)
    expect(suggestions[0].description).toBe(
      'You are INR 15 over budget. Consider implementing the suggestions below to reduce costs.',
    )
  })

  it('names the plan currency in the summary', () => {
    const [summary] = evaluateBudget([], 12.5, 10, 'USD').recipeChangeSuggestions
    expect(summary.description).toBe(
      'You are USD 2.5 over budget. Consider implementing the suggestions below to reduce costs.',
    )
  })
})

describe('suggestSavings', () => {
  it.each([
    ['dairy', 101, 'high', 40.4],
    ['dairy', 100, 'low', 20],
    ['protein', 200, 'high', 100],
    ['protein', 150, 'low', 30],
    ['vegetables', 90, 'medium', 22.5],
    ['grains', 120, 'medium', 36],
    ['spices', 60, 'low', 12],
  ] as const)('%s costing %d → %s impact saving %d', (category, cost, impact, savings) => {
    const suggestion = suggestSavings(makeItem({ category, effectiveCost: cost }))
    expect(suggestion?.impact).toBe(impact)
    expect(suggestion?.estimatedSavings).toBe(savings)
  })

  it('produces nothing for cheap items', () => {
    expect(suggestSavings(makeItem({ category: 'oils', effectiveCost: 50 }))).toBeNull()
  })
})
