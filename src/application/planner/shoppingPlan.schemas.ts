/**
 * Shopping plan request schemas
 *
 * Structural validation at the planner edge. Free-text ingredient lines only
 * need to be non-blank here; their parsing is lenient and never fails.
 */

import { z } from 'zod'

export const ingredientSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  quantity: z.number().finite().nonnegative('quantity must not be negative'),
  unit: z.string().trim().min(1, 'unit is required'),
})

export const ingredientLineSchema = z.string().trim().min(1, 'ingredient line must not be empty')

export const ingredientEntrySchema = z.union([ingredientLineSchema, ingredientSchema])

export const mealSchema = z.object({
  type: z.string().optional(),
  name: z.string().optional(),
  servings: z.number().int().positive().optional(),
  ingredients: z.array(ingredientEntrySchema, {
    required_error: 'ingredients list is required',
  }),
})

export const dayPlanSchema = z.object({
  day: z.number().int().min(1).max(7),
  meals: z.array(mealSchema, { required_error: 'meals list is required' }),
})

export const menuSchema = z.object({
  days: z.array(dayPlanSchema, { required_error: 'days list is required' }),
})

export const recipeIngredientsSchema = z.object({
  recipeName: z.string().optional(),
  ingredients: z.record(z.array(ingredientLineSchema), {
    required_error: 'ingredients sections are required',
  }),
})

const planOptionsShape = {
  vendors: z.array(z.string().trim().min(1, 'vendor name must not be empty')).default([]),
  budget: z.number({ required_error: 'budget is required' }).finite(),
  currency: z.string().trim().regex(/^[A-Za-z]{3}$/, 'currency must be a three-letter code').optional(),
}

export const weeklyShoppingRequestSchema = z.object({
  menu: menuSchema,
  ...planOptionsShape,
})

export const recipeShoppingRequestSchema = z.object({
  recipe: recipeIngredientsSchema,
  ...planOptionsShape,
})

export type WeeklyShoppingRequest = z.input<typeof weeklyShoppingRequestSchema>
export type RecipeShoppingRequest = z.input<typeof recipeShoppingRequestSchema>
