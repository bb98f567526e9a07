import { z } from 'zod'
import { DEFAULT_VENDORS } from '@domain/constants/pricing.ts'

export interface PlannerConfig {
  /** ISO 4217 code reported on every plan when the request names none. */
  currency: string
  /** Vendors priced when a request supplies an empty vendor list. */
  defaultVendors: string[]
}

export const DEFAULT_PLANNER_CONFIG: Readonly<PlannerConfig> = Object.freeze({
  currency: 'INR',
  defaultVendors: [...DEFAULT_VENDORS],
})

const envSchema = z.object({
  BASKETWISE_CURRENCY: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{3}$/, 'must be a three-letter currency code')
    .transform((code) => code.toUpperCase())
    .optional(),
  BASKETWISE_DEFAULT_VENDORS: z
    .string()
    .transform((list) =>
      list
        .split(',')
        .map((vendor) => vendor.trim())
        .filter((vendor) => vendor.length > 0),
    )
    .pipe(z.array(z.string()).min(1, 'must name at least one vendor'))
    .optional(),
})

/**
 * Read planner defaults from the environment. Unset variables keep the
 * built-in defaults; invalid ones throw naming the variable.
 */
export function loadPlannerConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join('; ')
    throw new Error(`Invalid planner configuration: ${details}`)
  }

  return {
    currency: parsed.data.BASKETWISE_CURRENCY ?? DEFAULT_PLANNER_CONFIG.currency,
    defaultVendors: parsed.data.BASKETWISE_DEFAULT_VENDORS ?? [...DEFAULT_PLANNER_CONFIG.defaultVendors],
  }
}
