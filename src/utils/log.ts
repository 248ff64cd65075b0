/**
 * hierconf Logger: debug logging of configuration changes.
 *
 * Two log functions:
 * 1. logChange: called once per successful mutation with the change event
 * 2. logDetach: called once when a live view loses its anchor
 *
 * Zero runtime cost when log flag is false (returns no-op logger).
 */

import type { ChangeEvent, DebugConfig } from '../core/types'
import { countNodes } from '../tree/node'
import type { ConfigNode } from '../tree/types'

export interface ConfigurationLogger {
  logChange: (event: ChangeEvent, root: ConfigNode) => void
  logDetach: (anchorName: string, reason: 'removed' | 'explicit') => void
}

// ---------------------------------------------------------------------------
// No-op singleton (zero overhead when log is false)
// ---------------------------------------------------------------------------

const noop = () => {
  // no-op
}

const NOOP_LOGGER: ConfigurationLogger = {
  logChange: noop,
  logDetach: noop,
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const PREFIX = 'hierconf'

/** Short label for a key; the root has no key. */
const keyLabel = (key: string | null): string => key || '(root)'

/** Build console summary object for a change. @internal */
export const buildChangeSummary = (
  event: ChangeEvent,
  nodeCount: number,
): Record<string, unknown> => {
  const summary: Record<string, unknown> = {
    kind: event.kind,
    key: keyLabel(event.key),
    nodes: nodeCount,
  }
  if (event.value !== undefined) {
    summary['value'] = event.value
  }
  return summary
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a logger for a configuration.
 * Returns no-op when log flag is disabled (zero overhead).
 */
export const createLogger = (config: DebugConfig): ConfigurationLogger => {
  const { log = false } = config

  if (!log) return NOOP_LOGGER

  return {
    logChange: (event, root) => {
      console.groupCollapsed(
        `${PREFIX}:change | ${event.kind} ${keyLabel(event.key)}`,
      )
      console.log(buildChangeSummary(event, countNodes(root)))
      console.groupEnd()
    },

    logDetach: (anchorName, reason) => {
      console.log(`${PREFIX}:detach | ${anchorName || '(root)'} (${reason})`)
    },
  }
}
