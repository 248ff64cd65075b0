/**
 * hierconf
 *
 * Hierarchical configuration trees with:
 * - A key language for addressing nodes, repeated siblings and attributes
 * - Persistent, copy-on-write node snapshots
 * - Subsets, live sub-views and read-only views tracked by node identity
 * - Variable interpolation, change listeners and debug logging
 */

// =============================================================================
// CORE PUBLIC API
// =============================================================================

// Configurations
export {
  type ConfigurationSource,
  HierarchicalConfiguration,
  SubnodeConfiguration,
} from './configuration/hierarchical-configuration'
export { ImmutableHierarchicalConfiguration } from './configuration/immutable-configuration'
export { AbstractHierarchicalConfiguration } from './configuration/abstract-configuration'
export { SUBSET_VALUE_NODE } from './configuration/subset'
export type { ImmutableConfiguration, ViewSource } from './configuration/types'

// Options and events
export type {
  ChangeEvent,
  ChangeKind,
  ConfigurationListener,
  ConfigurationOptions,
  DebugConfig,
} from './core/types'
export {
  DEFAULT_CONFIGURATION_OPTIONS,
  type ResolvedOptions,
} from './core/defaults'
export { configurationOptionsSchema, resolveOptions } from './core/options'

// Errors
export {
  AmbiguousKeyError,
  ConfigurationError,
  type ConfigurationErrorCode,
  InterpolationError,
  InvalidOptionsError,
  InvalidSourceError,
  KeyNotFoundError,
  MalformedKeyError,
  ReadOnlyConfigurationError,
} from './core/errors'

// =============================================================================
// KEYS
// =============================================================================

export {
  APPEND_INDEX,
  clearKeyCache,
  escapeKeyPart,
  isAttributeKey,
  joinKeys,
  parseKey,
  renderKey,
  renderSegment,
} from './key/key-parser'
export { ConfigurationKey } from './key/configuration-key'

// =============================================================================
// NODE TREE
// =============================================================================

export type {
  ConfigNode,
  KeySegment,
  NodeAddData,
  NodeId,
  NodeLocation,
  NodeSource,
} from './tree/types'
export {
  copyTree,
  createNode,
  isEmptyTree,
  isUndefinedNode,
  NodeBuilder,
} from './tree/node'
export {
  ATTRIBUTE_PREFIX,
  buildTree,
  buildTreeFromObject,
} from './tree/build-tree'
export {
  collectValues,
  nodeKey,
  prepareAdd,
  resolveKey,
  resolveSingle,
  uniqueValue,
} from './tree/resolver'
export { NodeModel, type NodeTracker } from './model/node-model'

// =============================================================================
// UTILITIES
// =============================================================================

export {
  ConfigurationInterpolator,
  environmentLookup,
  type Interpolator,
  type InterpolatorOptions,
  type VariableLookup,
} from './utils/interpolation'
export { type ConfigurationLogger, createLogger } from './utils/log'
