import type { Category } from './categories.ts'

export interface CategoryPricing {
  basePrice: number
  packageSize: number
  /** null means the package is sold in the item's own unit. */
  packageUnit: string | null
  /** Fractional spread of vendor prices around basePrice (0.3 = ±30%). */
  priceVariance: number
}

export const CATEGORY_PRICING: Record<Category, CategoryPricing> = {
  vegetables: { basePrice: 40, packageSize: 500, packageUnit: 'gram', priceVariance: 0.3 },
  fruits: { basePrice: 60, packageSize: 500, packageUnit: 'gram', priceVariance: 0.25 },
  grains: { basePrice: 50, packageSize: 1000, packageUnit: 'gram', priceVariance: 0.2 },
  dairy: { basePrice: 180, packageSize: 200, packageUnit: 'gram', priceVariance: 0.15 },
  protein: { basePrice: 250, packageSize: 500, packageUnit: 'gram', priceVariance: 0.25 },
  spices: { basePrice: 30, packageSize: 50, packageUnit: 'gram', priceVariance: 0.4 },
  oils: { basePrice: 150, packageSize: 500, packageUnit: 'ml', priceVariance: 0.2 },
  other: { basePrice: 100, packageSize: 500, packageUnit: null, priceVariance: 0.3 },
}

export const DEFAULT_VENDORS: readonly string[] = ['VendorA', 'VendorB', 'VendorC']

/** Vendors priced per item; longer vendor lists are truncated. */
export const MAX_VENDORS = 3
