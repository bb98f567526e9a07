import { describe, it, expect } from 'vitest'
import { DEFAULT_PLANNER_CONFIG, loadPlannerConfig } from '@infrastructure/config/environment.ts'

describe('loadPlannerConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadPlannerConfig({})).toEqual({ currency: 'INR', defaultVendors: ['VendorA', 'VendorB', 'VendorC'] })
  })

  it('reads currency and vendors from the environment', () => {
    const config = loadPlannerConfig({
      BASKETWISE_CURRENCY: ' usd ',
      BASKETWISE_DEFAULT_VENDORS: ' Local Market , Online,',
    })
    expect(config).toEqual({ currency: 'USD', defaultVendors: ['Local Market', 'Online'] })
  })

  it('rejects a malformed currency', () => {
    expect(() => loadPlannerConfig({ BASKETWISE_CURRENCY: 'dollars' })).toThrow(
      'Invalid planner configuration: BASKETWISE_CURRENCY must be a three-letter currency code',
    )
  })

  it('rejects an empty vendor list', () => {
    expect(() => loadPlannerConfig({ BASKETWISE_DEFAULT_VENDORS: ' , ' })).toThrow(
      'Invalid planner configuration: BASKETWISE_DEFAULT_VENDORS must name at least one vendor',
    )
  })

  it('does not share the default vendor array', () => {
    const config = loadPlannerConfig({})
    config.defaultVendors.push('Extra')
    expect(DEFAULT_PLANNER_CONFIG.defaultVendors).toEqual(['VendorA', 'VendorB', 'VendorC'])
  })
})
