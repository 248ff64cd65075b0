/**
 * Option validation
 *
 * Options arrive from user code and are checked once at construction;
 * everything downstream works with ResolvedOptions.
 */

import { z } from 'zod'

import type { Interpolator } from '../utils/interpolation'
import { DEFAULT_CONFIGURATION_OPTIONS, type ResolvedOptions } from './defaults'
import { InvalidOptionsError } from './errors'
import type { ConfigurationListener, ConfigurationOptions } from './types'

const listenerSchema = z.custom<ConfigurationListener>(
  (value) => typeof value === 'function',
  { message: 'listener must be a function' },
)

const interpolatorSchema = z.custom<Interpolator>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    'interpolate' in value &&
    typeof value.interpolate === 'function',
  { message: 'interpolator must provide an interpolate() function' },
)

export const configurationOptionsSchema = z
  .object({
    interpolator: interpolatorSchema.nullable().optional(),
    throwOnMissing: z.boolean().optional(),
    listeners: z.array(listenerSchema).optional(),
    debug: z
      .object({
        log: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict()

/**
 * Validates options and merges them over the defaults.
 *
 * @throws InvalidOptionsError listing every problem found
 */
export const resolveOptions = (
  options: ConfigurationOptions = {},
): ResolvedOptions => {
  const result = configurationOptionsSchema.safeParse(options)
  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(options)'}: ${issue.message}`,
      ),
    )
  }

  const parsed = result.data
  return {
    interpolator: parsed.interpolator,
    throwOnMissing:
      parsed.throwOnMissing ?? DEFAULT_CONFIGURATION_OPTIONS.throwOnMissing,
    listeners: [...(parsed.listeners ?? DEFAULT_CONFIGURATION_OPTIONS.listeners)],
    debug: {
      log: parsed.debug?.log ?? DEFAULT_CONFIGURATION_OPTIONS.debug.log,
    },
  }
}
