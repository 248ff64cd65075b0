import { describe, expect, it } from 'vitest'

import { HierarchicalConfiguration } from '~/configuration/hierarchical-configuration'
import { DEFAULT_CONFIGURATION_OPTIONS } from '~/core/defaults'
import { InvalidOptionsError } from '~/core/errors'
import { resolveOptions } from '~/core/options'
import type { ConfigurationOptions } from '~/core/types'
import { ConfigurationInterpolator } from '~/utils/interpolation'

/** Options as untyped callers (JSON, plain JS) hand them over. */
const untyped = (json: string): ConfigurationOptions => JSON.parse(json)

const issuesOf = (options: ConfigurationOptions): string[] => {
  try {
    resolveOptions(options)
  } catch (error) {
    if (error instanceof InvalidOptionsError) {
      return error.issues
    }
    throw error
  }
  return []
}

describe('resolveOptions', () => {
  it('should fill in the defaults', () => {
    expect(resolveOptions()).toEqual(DEFAULT_CONFIGURATION_OPTIONS)
    expect(resolveOptions({})).toEqual(DEFAULT_CONFIGURATION_OPTIONS)
  })

  it('should keep the given values', () => {
    const interpolator = new ConfigurationInterpolator()
    const listener = () => undefined

    const resolved = resolveOptions({
      interpolator,
      throwOnMissing: true,
      listeners: [listener],
      debug: { log: true },
    })

    expect(resolved.interpolator).toBe(interpolator)
    expect(resolved.throwOnMissing).toBe(true)
    expect(resolved.listeners).toEqual([listener])
    expect(resolved.debug.log).toBe(true)
  })

  it('should keep null to disable interpolation', () => {
    expect(resolveOptions({ interpolator: null }).interpolator).toBeNull()
  })

  it('should not share the listener array', () => {
    const listeners = [() => undefined]
    const resolved = resolveOptions({ listeners })

    listeners.push(() => undefined)

    expect(resolved.listeners).toHaveLength(1)
  })

  it('should report wrong types', () => {
    expect(issuesOf(untyped('{"throwOnMissing":"yes"}'))).toEqual([
      'throwOnMissing: Expected boolean, received string',
    ])
  })

  it('should report unknown options', () => {
    expect(issuesOf(untyped('{"verbose":true}'))).toEqual([
      "(options): Unrecognized key(s) in object: 'verbose'",
    ])
  })

  it('should report listeners that are not functions', () => {
    expect(issuesOf(untyped('{"listeners":["onChange"]}'))).toEqual([
      'listeners.0: listener must be a function',
    ])
  })

  it('should report interpolators without interpolate()', () => {
    expect(issuesOf(untyped('{"interpolator":{}}'))).toEqual([
      'interpolator: interpolator must provide an interpolate() function',
    ])
  })

  it('should reject invalid options at construction', () => {
    expect(() => new HierarchicalConfiguration(null, untyped('{"debug":{"log":1}}'))).toThrow(
      'Invalid configuration options: debug.log: Expected boolean, received number',
    )
  })
})
