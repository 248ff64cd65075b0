import type { Interpolator } from '../utils/interpolation'
import type { ConfigurationListener } from './types'

export interface ResolvedOptions {
  /** `undefined` selects the default interpolator, `null` disables it */
  interpolator: Interpolator | null | undefined
  throwOnMissing: boolean
  listeners: ConfigurationListener[]
  debug: {
    log: boolean
  }
}

export const DEFAULT_CONFIGURATION_OPTIONS: ResolvedOptions = {
  interpolator: undefined,
  throwOnMissing: false,
  listeners: [],
  debug: {
    log: false,
  },
}
