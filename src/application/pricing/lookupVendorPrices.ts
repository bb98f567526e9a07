import type { VendorOption } from '@domain/models/ShoppingPlan.ts'
import type { Category } from '@domain/constants/categories.ts'
import { CATEGORY_PRICING, DEFAULT_VENDORS, MAX_VENDORS } from '@domain/constants/pricing.ts'
import { hashToUnitInterval } from './hashToUnitInterval.ts'

export type PriceLookup = (
  itemName: string,
  unit: string,
  category: Category,
  vendors: readonly string[],
) => VendorOption[]

/** Round to cents. */
export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100
}

/** Vendors actually priced: input order, at most MAX_VENDORS, defaults when empty. */
export function resolveVendors(
  vendors: readonly string[],
  defaults: readonly string[] = DEFAULT_VENDORS,
): string[] {
  const source = vendors.length > 0 ? vendors : defaults
  return source.slice(0, MAX_VENDORS)
}

/**
 * Mock vendor pricing by category. Each vendor's price is the category base
 * price shifted by up to ±variance, where the shift is derived from the item
 * name and the vendor's position, so the same item always gets the same prices.
 */
export const lookupVendorPrices: PriceLookup = (itemName, unit, category, vendors) => {
  const pricing = CATEGORY_PRICING[category]

  return resolveVendors(vendors).map((vendor, index) => {
    const shift = (2 * hashToUnitInterval(itemName, index) - 1) * pricing.priceVariance
    return {
      vendor,
      packageSize: pricing.packageSize,
      packageUnit: pricing.packageUnit ?? unit,
      price: roundCurrency(pricing.basePrice * (1 + shift)),
    }
  })
}
