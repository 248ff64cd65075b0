/**
 * Configuration Type Definitions
 *
 * @module configuration/types
 */

import type { NodeModel } from '../model/node-model'
import type { ConfigNode, NodeId } from '../tree/types'
import type { Interpolator } from '../utils/interpolation'

/**
 * What a read-only view reads from: a fixed subtree, or a node of a live
 * model found again by identity on every access.
 */
export type ViewSource =
  | { kind: 'snapshot'; root: ConfigNode }
  | { kind: 'tracked'; model: NodeModel; anchorId: NodeId }

/** Read access shared by every configuration and view. */
export interface ImmutableConfiguration {
  getProperty(key: string | null): unknown
  getRawProperty(key: string | null): unknown
  getString(key: string | null): string | undefined
  getString(key: string | null, defaultValue: string): string
  getList(key: string | null, defaultValue?: readonly unknown[]): unknown[]
  containsKey(key: string | null): boolean
  isEmpty(): boolean
  size(): number
  getKeys(prefix?: string): string[]
  getMaxIndex(key: string | null): number
  getRootElementName(): string
  getRootNode(): ConfigNode
  getInterpolator(): Interpolator | null
  immutableConfigurationAt(
    key: string | null,
    supportUpdates?: boolean,
  ): ImmutableConfiguration
  immutableConfigurationsAt(key: string | null): ImmutableConfiguration[]
  immutableChildConfigurationsAt(key: string | null): ImmutableConfiguration[]
}
