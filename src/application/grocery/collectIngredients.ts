import type { Ingredient, IngredientEntry } from '@domain/models/Ingredient.ts'
import type { Menu, RecipeIngredients } from '@domain/models/Menu.ts'
import { parseIngredientLine } from '@application/parser/IngredientParser.ts'

export interface CollectedIngredients {
  ingredients: Ingredient[]
  /** Free-text lines that fell back to "whole line, 1 piece". */
  unparsedLines: string[]
}

function collectEntries(entries: Iterable<IngredientEntry>): CollectedIngredients {
  const ingredients: Ingredient[] = []
  const unparsedLines: string[] = []

  for (const entry of entries) {
    if (typeof entry !== 'string') {
      ingredients.push(entry)
      continue
    }
    const { ingredient, matched } = parseIngredientLine(entry)
    ingredients.push(ingredient)
    if (!matched) unparsedLines.push(entry)
  }

  return { ingredients, unparsedLines }
}

/** Flatten every ingredient of every meal of every day, parsing free-text entries. */
export function collectMenuIngredients(menu: Menu): CollectedIngredients {
  return collectEntries(menu.days.flatMap((day) => day.meals.flatMap((meal) => meal.ingredients)))
}

/** Flatten the ingredient lines of every section of a recipe. */
export function collectRecipeIngredients(recipe: RecipeIngredients): CollectedIngredients {
  return collectEntries(Object.values(recipe.ingredients).flat())
}
