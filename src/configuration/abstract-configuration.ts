/**
 * Read side shared by every configuration
 *
 * Subclasses decide where the tree comes from (a model they own, an anchor
 * in somebody else's model, a fixed snapshot) by implementing getRootNode();
 * everything here reads through it, so reads always see the current tree.
 *
 * @module configuration/abstract-configuration
 */

import type { ResolvedOptions } from '../core/defaults'
import { KeyNotFoundError, MalformedKeyError } from '../core/errors'
import { joinKeys, parseKey, renderSegment } from '../key/key-parser'
import type { NodeModel } from '../model/node-model'
import { hasValue, isEmptyTree } from '../tree/node'
import { collectValues, resolveKey, resolveNodes, resolveSingle } from '../tree/resolver'
import type { ConfigNode, KeySegment, NodeLocation } from '../tree/types'
import {
  ConfigurationInterpolator,
  type Interpolator,
} from '../utils/interpolation'
import { is } from '../utils/is'
import { createLogger, type ConfigurationLogger } from '../utils/log'
import { buildSubsetRoot } from './subset'
import type { HierarchicalConfiguration } from './hierarchical-configuration'
import type { ImmutableHierarchicalConfiguration } from './immutable-configuration'
import type { ImmutableConfiguration, ViewSource } from './types'

/** One value as is, several as an array, none as `undefined`. */
const collapse = (values: readonly unknown[]): unknown =>
  values.length > 1 ? [...values] : values[0]

export abstract class AbstractHierarchicalConfiguration
  implements ImmutableConfiguration
{
  protected readonly options: ResolvedOptions
  protected readonly logger: ConfigurationLogger
  private readonly interpolator: Interpolator | null

  protected constructor(options: ResolvedOptions) {
    this.options = options
    this.logger = createLogger(options.debug)
    this.interpolator =
      options.interpolator === undefined
        ? new ConfigurationInterpolator({
            defaultLookup: (name) => this.lookupVariable(name),
          })
        : options.interpolator
  }

  /** Root of the tree this configuration reads, as of now. */
  abstract getRootNode(): ConfigNode

  /** Model whose tree contains getRootNode(); tracked views anchor there. */
  protected abstract trackingModel(): NodeModel

  protected abstract createSubset(root: ConfigNode): HierarchicalConfiguration

  protected abstract createImmutableView(
    source: ViewSource,
  ): ImmutableHierarchicalConfiguration

  /** Options handed down to views and subsets taken from this configuration. */
  protected viewOptions(): ResolvedOptions {
    return { ...this.options, interpolator: this.interpolator, listeners: [] }
  }

  // ---------------------------------------------------------------------------
  // Resolution
  // ---------------------------------------------------------------------------

  protected fetchLocations(key: string | null | undefined): NodeLocation[] {
    return resolveKey(this.getRootNode(), parseKey(key))
  }

  protected fetchNodes(key: string | null | undefined): NodeLocation[] {
    return resolveNodes(this.getRootNode(), parseKey(key))
  }

  protected fetchSingle(key: string | null | undefined): NodeLocation {
    return resolveSingle(this.getRootNode(), parseKey(key))
  }

  // ---------------------------------------------------------------------------
  // Values
  // ---------------------------------------------------------------------------

  getInterpolator(): Interpolator | null {
    return this.interpolator
  }

  protected interpolate(value: unknown): unknown {
    return this.interpolator ? this.interpolator.interpolate(value) : value
  }

  private interpolatedValues(key: string | null | undefined): unknown[] {
    return collectValues(this.fetchLocations(key)).map((value) =>
      this.interpolate(value),
    )
  }

  /** Variables resolve against this configuration's raw values. */
  private lookupVariable(name: string): unknown {
    let segments: readonly KeySegment[]
    try {
      segments = parseKey(name)
    } catch (error) {
      if (error instanceof MalformedKeyError) {
        return undefined
      }
      throw error
    }
    return collectValues(resolveKey(this.getRootNode(), segments))[0]
  }

  /**
   * Value(s) stored at a key, interpolated.
   *
   * @returns The value when one location has one, an array when several
   *   do, `undefined` when none does
   */
  getProperty(key: string | null): unknown {
    return collapse(this.interpolatedValues(key))
  }

  /** Like {@link getProperty}, bypassing the interpolator. */
  getRawProperty(key: string | null): unknown {
    return collapse(collectValues(this.fetchLocations(key)))
  }

  /**
   * First value stored at a key, as a string.
   *
   * Missing keys give `defaultValue`, else `undefined`, or throw
   * KeyNotFoundError when the configuration was created with
   * `throwOnMissing`.
   */
  getString(key: string | null): string | undefined
  getString(key: string | null, defaultValue: string): string
  getString(key: string | null, defaultValue?: string): string | undefined {
    const [first] = this.interpolatedValues(key)
    if (first !== undefined) {
      return is.string(first) ? first : String(first)
    }
    if (defaultValue !== undefined) {
      return defaultValue
    }
    if (this.options.throwOnMissing) {
      throw new KeyNotFoundError(key ?? '')
    }
    return undefined
  }

  /** Every value stored at a key, interpolated; a single value becomes `[value]`. */
  getList(key: string | null, defaultValue: readonly unknown[] = []): unknown[] {
    const values = this.interpolatedValues(key)
    return values.length > 0 ? values : [...defaultValue]
  }

  containsKey(key: string | null): boolean {
    return collectValues(this.fetchLocations(key)).length > 0
  }

  /** True when no node and no attribute holds a value. */
  isEmpty(): boolean {
    return isEmptyTree(this.getRootNode())
  }

  size(): number {
    return this.getKeys().length
  }

  /**
   * Keys of all nodes and attributes that hold a value, without indices,
   * in tree order and without duplicates. With a prefix, only keys at or
   * below the nodes the prefix selects.
   *
   * @example
   * ```typescript
   * config.getKeys('tables.table')
   * // ['tables.table[@type]', 'tables.table.name', 'tables.table.fields.field.name']
   * ```
   */
  getKeys(prefix?: string): string[] {
    const keys = new Set<string>()

    const visit = (node: ConfigNode, key: string): void => {
      if (key && hasValue(node)) {
        keys.add(key)
      }
      for (const name of node.attributes.keys()) {
        keys.add(joinKeys(key, renderSegment({ name, attribute: true })))
      }
      for (const child of node.children) {
        visit(child, joinKeys(key, renderSegment({ name: child.name, attribute: false })))
      }
    }

    if (prefix === undefined) {
      visit(this.getRootNode(), '')
      return [...keys]
    }

    for (const location of this.fetchLocations(prefix)) {
      if (location.attribute !== undefined) {
        keys.add(prefix)
      } else {
        visit(location.node, prefix)
      }
    }
    return [...keys]
  }

  /** Highest index usable with the key; -1 when it selects no node. */
  getMaxIndex(key: string | null): number {
    return this.fetchNodes(key).length - 1
  }

  getRootElementName(): string {
    return this.getRootNode().name
  }

  // ---------------------------------------------------------------------------
  // Subsets and read-only views
  // ---------------------------------------------------------------------------

  /**
   * Independent configuration made of everything the key selects.
   *
   * Lenient: a key that selects nothing gives an empty configuration.
   * Variables keep resolving against this configuration.
   */
  subset(key: string | null): HierarchicalConfiguration {
    return this.createSubset(buildSubsetRoot(this.fetchLocations(key)))
  }

  /**
   * Read-only view of the single node a key selects.
   *
   * By default the view holds the subtree as it is now. With
   * `supportUpdates` it finds the node again by identity on every read and
   * reads as empty once the node was removed.
   *
   * @throws KeyNotFoundError if the key selects no node
   * @throws AmbiguousKeyError if it selects several
   */
  immutableConfigurationAt(
    key: string | null,
    supportUpdates = false,
  ): ImmutableHierarchicalConfiguration {
    const { node } = this.fetchSingle(key)
    return supportUpdates
      ? this.createImmutableView({
          kind: 'tracked',
          model: this.trackingModel(),
          anchorId: node.id,
        })
      : this.createImmutableView({ kind: 'snapshot', root: node })
  }

  /** One read-only snapshot view per node the key selects. */
  immutableConfigurationsAt(key: string | null): ImmutableHierarchicalConfiguration[] {
    return this.fetchNodes(key).map(({ node }) =>
      this.createImmutableView({ kind: 'snapshot', root: node }),
    )
  }

  /**
   * One read-only snapshot view per child of the node the key selects.
   * A key selecting no node or several nodes gives an empty list.
   */
  immutableChildConfigurationsAt(
    key: string | null,
  ): ImmutableHierarchicalConfiguration[] {
    const nodes = this.fetchNodes(key)
    const [single] = nodes
    if (!single || nodes.length > 1) {
      return []
    }
    return single.node.children.map((child) =>
      this.createImmutableView({ kind: 'snapshot', root: child }),
    )
  }
}
