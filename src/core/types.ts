/**
 * Core Configuration Types
 *
 * Foundational type definitions shared by the configuration classes.
 */

import type { Interpolator } from '../utils/interpolation'

/**
 * Debug configuration for development tooling
 */
export interface DebugConfig {
  /** Log every change event and view detachment to the console */
  log?: boolean
}

export interface ConfigurationOptions {
  /**
   * Post-processing of string values on read. Defaults to `${name}`
   * substitution against the configuration itself; `null` disables it.
   */
  interpolator?: Interpolator | null
  /** Throw KeyNotFoundError from getString() on missing keys (default: false) */
  throwOnMissing?: boolean
  /** Listeners registered at construction */
  listeners?: ConfigurationListener[]
  /** Debug configuration for development tooling */
  debug?: DebugConfig
}

export type ChangeKind =
  | 'setRootNode'
  | 'addProperty'
  | 'addNodes'
  | 'setProperty'
  | 'clearProperty'
  | 'clearTree'
  | 'clear'
  | 'detach'

/**
 * Describes a successful mutation.
 *
 * `key` is relative to the configuration the change was made through;
 * `null` means the root of that configuration.
 */
export interface ChangeEvent {
  kind: ChangeKind
  key: string | null
  value?: unknown
}

/** Called after every successful mutation, in registration order. */
export type ConfigurationListener = (event: ChangeEvent) => void
