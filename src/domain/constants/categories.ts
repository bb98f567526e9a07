import { z } from 'zod'
import keywordTable from './categoryKeywords.json'

export const CATEGORIES = [
  'vegetables',
  'fruits',
  'grains',
  'dairy',
  'protein',
  'spices',
  'oils',
  'other',
] as const

export type Category = (typeof CATEGORIES)[number]

export interface CategoryKeywords {
  category: Exclude<Category, 'other'>
  keywords: string[]
}

const categoryKeywordsSchema = z.array(
  z.object({
    category: z.enum(['vegetables', 'fruits', 'grains', 'dairy', 'protein', 'spices', 'oils']),
    keywords: z.array(z.string().min(1)).min(1),
  }),
)

/**
 * Keyword lists in fixed priority order. The first category with a keyword
 * contained in the name wins, so the order of this table is part of the
 * categorization contract: "tomato sauce" is vegetables, "butter" is dairy,
 * "black pepper" is vegetables.
 */
export const CATEGORY_KEYWORDS: readonly CategoryKeywords[] = categoryKeywordsSchema.parse(keywordTable)

/** Map an ingredient name to its shopping category; unmatched names are 'other'. */
export function lookupCategory(name: string): Category {
  const lower = name.toLowerCase()
  for (const { category, keywords } of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) return category
  }
  return 'other'
}

