import { describe, it, expect } from 'vitest'
import { collectMenuIngredients, collectRecipeIngredients } from '@application/grocery/collectIngredients.ts'
import type { Menu } from '@domain/models/Menu.ts'

describe('collectMenuIngredients', () => {
  it('flattens days and meals, parsing free-text entries', () => {
    const menu: Menu = {
      days: [
        {
          day: 1,
          meals: [
            { type: 'breakfast', name: 'Masala Oats', ingredients: [{ name: 'Oats', quantity: 50, unit: 'gram' }, '1 onion, chopped'] },
          ],
        },
        {
          day: 2,
          meals: [{ type: 'dinner', ingredients: ['80 g paneer', 'salt to taste'] }],
        },
      ],
    }

    const { ingredients, unparsedLines } = collectMenuIngredients(menu)

    expect(ingredients).toEqual([
      { name: 'Oats', quantity: 50, unit: 'gram' },
      { name: 'onion', quantity: 1, unit: 'piece' },
      { name: 'paneer', quantity: 80, unit: 'g' },
      { name: 'salt to taste', quantity: 1, unit: 'piece' },
    ])
    expect(unparsedLines).toEqual(['salt to taste'])
  })

  it('accepts a menu with no days', () => {
    expect(collectMenuIngredients({ days: [] })).toEqual({ ingredients: [], unparsedLines: [] })
  })
})

describe('collectRecipeIngredients', () => {
  it('reads every section in order', () => {
    const { ingredients } = collectRecipeIngredients({
      recipeName: 'Penne Arrabbiata',
      ingredients: {
        'For the Sauce': ['2 tablespoons olive oil', '1 onion, chopped'],
        'For the Pasta': ['1 pound penne'],
      },
    })

    expect(ingredients.map((i) => i.name)).toEqual(['olive oil', 'onion', 'penne'])
  })
})
