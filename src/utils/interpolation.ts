/**
 * Variable interpolation utilities
 *
 * Substitutes `${name}` placeholders in string values. Configurations use
 * this on every non-raw read; subsets and views share the interpolator of
 * the configuration they were taken from, so variables keep resolving
 * against the original tree.
 */

import { InterpolationError } from '../core/errors'
import { is } from './is'

/** Post-processing step applied to values read from a configuration. */
export interface Interpolator {
  interpolate(value: unknown): unknown
}

/** Resolves a variable name to a raw value, `undefined` when unknown. */
export type VariableLookup = (name: string) => unknown

const VARIABLE = /\$\{([^}]+)\}/g
const SINGLE_VARIABLE = /^\$\{([^}]+)\}$/
const PREFIX_SEPARATOR = ':'

/** Reads environment variables. */
export const environmentLookup: VariableLookup = (name) => process.env[name]

export interface InterpolatorOptions {
  /** Lookup for variables without a known prefix */
  defaultLookup?: VariableLookup
  /** Lookups selected by a `prefix:` in the variable name */
  prefixLookups?: Record<string, VariableLookup>
}

/**
 * Interpolator with a default lookup and prefixed lookups.
 *
 * - A value that is exactly one placeholder resolves to the raw looked-up
 *   value, whatever its type.
 * - Inside longer strings only strings, numbers and booleans are
 *   substituted; unknown variables keep their placeholder.
 * - Resolved strings are interpolated again; a variable referring back to
 *   itself fails with InterpolationError.
 *
 * @example
 * const interpolator = new ConfigurationInterpolator({
 *   defaultLookup: (name) => ({ host: 'localhost' })[name],
 * })
 * interpolator.interpolate('http://${host}:${env:PORT}')
 */
export class ConfigurationInterpolator implements Interpolator {
  private readonly defaultLookup: VariableLookup
  private readonly prefixLookups: Record<string, VariableLookup>

  constructor(options: InterpolatorOptions = {}) {
    this.defaultLookup = options.defaultLookup ?? (() => undefined)
    this.prefixLookups = { env: environmentLookup, ...options.prefixLookups }
  }

  interpolate(value: unknown): unknown {
    return this.interpolateWith(value, new Set())
  }

  /** Raw value of a variable, honoring prefixes. */
  lookup(name: string): unknown {
    const separator = name.indexOf(PREFIX_SEPARATOR)
    if (separator > 0) {
      const prefixLookup = this.prefixLookups[name.slice(0, separator)]
      if (prefixLookup) {
        return prefixLookup(name.slice(separator + 1))
      }
    }
    return this.defaultLookup(name)
  }

  private interpolateWith(value: unknown, resolving: Set<string>): unknown {
    if (!is.string(value) || !value.includes('${')) {
      return value
    }

    const single = SINGLE_VARIABLE.exec(value)
    if (single?.[1]) {
      const resolved = this.resolveWith(single[1], resolving)
      return is.nil(resolved) ? value : resolved
    }

    return value.replace(VARIABLE, (match, name: string) => {
      const resolved = this.resolveWith(name, resolving)

      // Only interpolate serializable primitives
      if (is.string(resolved)) return resolved
      if (is.number(resolved)) return String(resolved)
      if (is.boolean(resolved)) return String(resolved)

      // Leave original ${name} for debugging (null, undefined, objects, arrays)
      return match
    })
  }

  private resolveWith(name: string, resolving: Set<string>): unknown {
    if (resolving.has(name)) {
      throw new InterpolationError(
        name,
        `Cyclic reference while interpolating '\${${name}}'`,
      )
    }

    const raw = this.lookup(name)
    if (!is.string(raw)) {
      return raw
    }

    resolving.add(name)
    try {
      return this.interpolateWith(raw, resolving)
    } finally {
      resolving.delete(name)
    }
  }
}
