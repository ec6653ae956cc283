/**
 * Config schema validation tests
 */

import { describe, it, expect } from 'vitest'
import { configSchema, thresholdsConfigSchema, styleConfigSchema } from '../schema.js'

describe('configSchema', () => {
  it('parses an empty object with defaults', () => {
    const config = configSchema.parse({})
    expect(config.connection).toEqual({ type: 'powershell', pwshPath: 'pwsh' })
    expect(config.style).toEqual({})
  })

  it('uppercases the site code', () => {
    expect(configSchema.parse({ site: { code: 'ps1' } }).site.code).toBe('PS1')
  })

  it('rejects site codes that could break out of a script', () => {
    expect(configSchema.safeParse({ site: { code: "P'1" } }).success).toBe(false)
  })

  it('rejects a non-positive query timeout', () => {
    expect(configSchema.safeParse({ queryTimeoutMs: 0 }).success).toBe(false)
  })
})

describe('thresholdsConfigSchema', () => {
  it('rejects percentages above 100', () => {
    expect(thresholdsConfigSchema.safeParse({ diskFreePercent: 101 }).success).toBe(false)
  })

  it('rejects negative counts', () => {
    expect(thresholdsConfigSchema.safeParse({ componentErrorCount: -1 }).success).toBe(false)
  })
})

describe('styleConfigSchema', () => {
  it('accepts hex colours per status', () => {
    const style = styleConfigSchema.parse({ warning: { label: 'Attention', background: '#fff3cd' } })
    expect(style.warning).toEqual({ label: 'Attention', background: '#fff3cd' })
  })

  it('rejects unknown statuses', () => {
    expect(styleConfigSchema.safeParse({ degraded: { label: 'x' } }).success).toBe(false)
  })

  it('rejects colours that are not hex', () => {
    expect(styleConfigSchema.safeParse({ healthy: { color: 'red;}body{' } }).success).toBe(false)
  })
})
