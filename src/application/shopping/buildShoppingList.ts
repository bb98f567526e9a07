import type { AggregatedIngredient } from '@domain/models/Ingredient.ts'
import type { ShoppingLineItem, VendorOption } from '@domain/models/ShoppingPlan.ts'
import { lookupCategory } from '@domain/constants/categories.ts'
import { lookupVendorPrices, type PriceLookup } from '@application/pricing/lookupVendorPrices.ts'

export interface PackageChoice {
  vendor: string
  packagesNeeded: number
  price: number
  effectiveCost: number
}

export interface ShoppingListResult {
  items: ShoppingLineItem[]
  totalCost: number
}

export interface BuildShoppingListOptions {
  lookupPrices?: PriceLookup
}

/** Whole packages only: a partial package is bought as a full one. */
export function costOption(quantity: number, option: VendorOption): PackageChoice {
  const packagesNeeded = Math.ceil(quantity / option.packageSize)
  return {
    vendor: option.vendor,
    packagesNeeded,
    price: option.price,
    effectiveCost: packagesNeeded * option.price,
  }
}

/**
 * Cheapest way to buy `quantity` across the options. A left fold that only
 * replaces the running best on a strictly lower cost, so the first of
 * several equal options wins. Returns null for an empty option list.
 */
export function selectCheapestOption(quantity: number, options: readonly VendorOption[]): PackageChoice | null {
  return options.reduce<PackageChoice | null>((best, option) => {
    const candidate = costOption(quantity, option)
    return best === null || candidate.effectiveCost < best.effectiveCost ? candidate : best
  }, null)
}

/**
 * Price every aggregated ingredient and pick its cheapest vendor/package.
 * totalCost is the sum of the chosen effective costs in list order.
 */
export function buildShoppingList(
  aggregate: Iterable<AggregatedIngredient>,
  vendors: readonly string[],
  options: BuildShoppingListOptions = {},
): ShoppingListResult {
  const lookupPrices = options.lookupPrices ?? lookupVendorPrices
  const items: ShoppingLineItem[] = []
  let totalCost = 0

  for (const { name, unit, quantity } of aggregate) {
    const category = lookupCategory(name)
    const storeOptions = lookupPrices(name, unit, category, vendors)
    const best = selectCheapestOption(quantity, storeOptions)
    if (best === null) {
      throw new Error(`No vendor prices available for '${name}'`)
    }

    totalCost += best.effectiveCost
    items.push({
      item: name,
      category,
      requiredQuantity: quantity,
      unit,
      storeOptions,
      chosenStore: best.vendor,
      packagesNeeded: best.packagesNeeded,
      chosenPrice: best.price,
      effectiveCost: best.effectiveCost,
    })
  }

  return { items, totalCost }
}
