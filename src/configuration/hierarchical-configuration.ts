/**
 * Mutable configurations
 *
 * HierarchicalConfiguration owns a model holding the current snapshot of
 * its tree. SubnodeConfiguration is a live window on one node of another
 * configuration's model: it reads that node's current version and installs
 * its writes back into the owner, finding the node by identity every time.
 *
 * @module configuration/hierarchical-configuration
 */

import { resolveOptions } from '../core/options'
import type { ChangeEvent, ConfigurationListener, ConfigurationOptions } from '../core/types'
import { joinKeys, parseKey } from '../key/key-parser'
import { NodeModel, type NodeTracker } from '../model/node-model'
import {
  adoptIdentity,
  copyTree,
  createNode,
  mapValues,
  withAttribute,
  withUniqueIds,
  withValue,
  withoutAttribute,
} from '../tree/node'
import {
  addChildren,
  addPath,
  clearRoot,
  editNodes,
  removeSubtree,
  replaceNode,
  setNodeValue,
  type NodeEdit,
} from '../tree/mutations'
import {
  nodeKey,
  prepareAdd,
  resolveKey,
  resolveNodes,
  resolveSingle,
} from '../tree/resolver'
import type { ConfigNode, KeySegment, NodeId, NodeLocation } from '../tree/types'
import { guard } from '../utils/guards'
import { is } from '../utils/is'
import { AbstractHierarchicalConfiguration } from './abstract-configuration'
import { ImmutableHierarchicalConfiguration } from './immutable-configuration'
import type { ViewSource } from './types'

/** What a configuration can be created from. */
export type ConfigurationSource =
  | AbstractHierarchicalConfiguration
  | ConfigNode
  | null
  | undefined

const initialRoot = (source: ConfigurationSource): ConfigNode => {
  if (source instanceof AbstractHierarchicalConfiguration) {
    return copyTree(source.getRootNode())
  }
  return source ? withUniqueIds(source) : createNode()
}

const endsInAttribute = (segments: readonly KeySegment[]): boolean =>
  segments[segments.length - 1]?.attribute === true

const clearValue: NodeEdit = (node) => withValue(node, undefined)

const eventKey = (key: string | null): string | null => key || null

/**
 * Configuration backed by an in-memory node tree.
 *
 * @example
 * ```typescript
 * const config = new HierarchicalConfiguration(
 *   buildTreeFromObject({ tables: { table: [{ name: 'users' }, { name: 'documents' }] } }),
 * )
 * config.getString('tables.table(1).name') // 'documents'
 *
 * const table = config.configurationAt('tables.table(0)')
 * table.setProperty('name', 'accounts')
 * config.getString('tables.table(0).name') // 'accounts'
 * ```
 */
export class HierarchicalConfiguration extends AbstractHierarchicalConfiguration {
  protected readonly model: NodeModel

  /**
   * @param source - Root node to use, or a configuration to deep-copy;
   *   nothing gives an empty configuration
   * @param options - Validated with zod; listeners are not taken over from
   *   a source configuration
   * @throws InvalidOptionsError
   */
  constructor(source?: ConfigurationSource, options: ConfigurationOptions = {}) {
    super(resolveOptions(options))
    this.model = new NodeModel(initialRoot(source), this.logger, this.options.listeners)
  }

  getRootNode(): ConfigNode {
    return this.model.root
  }

  protected trackingModel(): NodeModel {
    return this.model
  }

  protected createSubset(root: ConfigNode): HierarchicalConfiguration {
    return new HierarchicalConfiguration(root, this.viewOptions())
  }

  protected createImmutableView(
    source: ViewSource,
  ): ImmutableHierarchicalConfiguration {
    return new ImmutableHierarchicalConfiguration(source, this.viewOptions())
  }

  /** Installs the tree produced by a write. */
  protected commitRoot(root: ConfigNode, event: ChangeEvent): void {
    this.model.commit(root, event)
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  /**
   * Replaces the value(s) at a key.
   *
   * An array is spread over the matched nodes in order: surplus values are
   * added as new nodes, surplus nodes lose their value (and are removed when
   * left empty). A key that matches nothing behaves like addProperty().
   * Attributes take the whole value. `null` and `undefined` clear the key.
   */
  setProperty(key: string | null, value: unknown): void {
    if (is.nil(value)) {
      this.clearProperty(key)
      return
    }

    const segments = parseKey(key)
    const root = this.getRootNode()
    const locations = resolveKey(root, segments)
    const attributeKey = endsInAttribute(segments)
    const event: ChangeEvent = { kind: 'setProperty', key: eventKey(key), value }

    const [single] = locations
    if (single && locations.length === 1 && (attributeKey || !is.array(value))) {
      this.commitRoot(setNodeValue(single, value), event)
      return
    }

    const edits = new Map<NodeId, NodeEdit>()
    let extra: readonly unknown[] = []

    if (attributeKey) {
      for (const location of locations) {
        const { attribute } = location
        if (attribute !== undefined) {
          edits.set(location.node.id, (node) => withAttribute(node, attribute, value))
        }
      }
      extra = locations.length === 0 ? [value] : []
    } else {
      const values = is.array(value) ? value : [value]
      locations.forEach((location, i) => {
        edits.set(
          location.node.id,
          i < values.length ? (node) => withValue(node, values[i]) : clearValue,
        )
      })
      extra = values.slice(locations.length)
    }

    let next = editNodes(root, edits, { prune: true })
    for (const element of extra) {
      next = addPath(prepareAdd(next, segments), element)
    }

    this.commitRoot(next, event)
  }

  /**
   * Adds value(s) at a key, creating missing nodes on the way.
   *
   * Every element of an array becomes a node of its own. Adding to an
   * existing key creates a new sibling; adding to an attribute that is set
   * makes it multi-valued. `null` and `undefined` are ignored.
   */
  addProperty(key: string | null, value: unknown): void {
    if (is.nil(value)) {
      return
    }

    const segments = parseKey(key)
    let root = this.getRootNode()
    for (const element of is.array(value) ? value : [value]) {
      root = addPath(prepareAdd(root, segments), element)
    }

    this.commitRoot(root, { kind: 'addProperty', key: eventKey(key), value })
  }

  /**
   * Adds copies of the nodes below the node a key selects. A key that
   * selects nothing is created first.
   *
   * @throws AmbiguousKeyError if the key selects several nodes
   * @throws MalformedKeyError if the key ends in an attribute
   */
  addNodes(key: string | null, nodes: readonly ConfigNode[]): void {
    if (nodes.length === 0) {
      return
    }

    const segments = parseKey(key)
    guard.nodeKey(key ?? '', segments, 'addNodes')

    const root = this.getRootNode()
    const copies = nodes.map(copyTree)
    const next =
      resolveNodes(root, segments).length === 0
        ? addPath(prepareAdd(root, segments), undefined, copies)
        : addChildren(resolveSingle(root, segments), copies)

    this.commitRoot(next, { kind: 'addNodes', key: eventKey(key) })
  }

  /**
   * Removes the value(s) at a key. Nodes left without value, children and
   * attributes are removed as well; for an attribute key the attribute is.
   */
  clearProperty(key: string | null): void {
    const segments = parseKey(key)
    const root = this.getRootNode()
    const locations = resolveKey(root, segments)
    if (locations.length === 0) {
      return
    }

    const edits = new Map<NodeId, NodeEdit>()
    for (const location of locations) {
      const { attribute } = location
      edits.set(
        location.node.id,
        attribute === undefined
          ? clearValue
          : (node) => withoutAttribute(node, attribute),
      )
    }

    const next = editNodes(root, edits, { prune: !endsInAttribute(segments) })
    this.commitRoot(next, { kind: 'clearProperty', key: eventKey(key) })
  }

  /** Removes the subtrees (or attributes) a key selects. */
  clearTree(key: string | null): void {
    const root = this.getRootNode()
    const locations = resolveKey(root, parseKey(key))
    if (locations.length === 0) {
      return
    }

    const edits = new Map<NodeId, NodeEdit>()
    for (const location of locations) {
      const { attribute } = location
      edits.set(
        location.node.id,
        attribute === undefined ? () => null : (node) => withoutAttribute(node, attribute),
      )
    }

    this.commitRoot(editNodes(root, edits), { kind: 'clearTree', key: eventKey(key) })
  }

  /** Removes everything; the root keeps its name. */
  clear(): void {
    this.commitRoot(clearRoot(this.getRootNode()), { kind: 'clear', key: null })
  }

  /** Installs a tree; a node reused at several positions is copied at all but the first. */
  setRootNode(root: ConfigNode): void {
    this.commitRoot(withUniqueIds(root), { kind: 'setRootNode', key: null })
  }

  // ---------------------------------------------------------------------------
  // Copies
  // ---------------------------------------------------------------------------

  /** Deep copy of the current tree, sharing no nodes; listeners stay here. */
  copy(): HierarchicalConfiguration {
    return new HierarchicalConfiguration(this, { ...this.options, listeners: [] })
  }

  /** Deep copy in which every value went through the interpolator. */
  interpolatedConfiguration(): HierarchicalConfiguration {
    const root = mapValues(copyTree(this.getRootNode()), (value) =>
      this.interpolate(value),
    )
    return new HierarchicalConfiguration(root, { ...this.options, listeners: [] })
  }

  // ---------------------------------------------------------------------------
  // Live views
  // ---------------------------------------------------------------------------

  /**
   * Live view of the single node a key selects.
   *
   * @throws KeyNotFoundError if the key selects no node
   * @throws AmbiguousKeyError if it selects several
   */
  configurationAt(key: string | null): SubnodeConfiguration {
    return this.createSubnodeConfiguration(this.fetchSingle(key).node)
  }

  /** One live view per node the key selects; none for an unknown key. */
  configurationsAt(key: string | null): SubnodeConfiguration[] {
    return this.fetchNodes(key).map(({ node }) => this.createSubnodeConfiguration(node))
  }

  /**
   * One live view per child of the node the key selects. A key selecting
   * no node or several nodes gives an empty list.
   */
  childConfigurationsAt(key: string | null): SubnodeConfiguration[] {
    const nodes = this.fetchNodes(key)
    const [single] = nodes
    if (!single || nodes.length > 1) {
      return []
    }
    return single.node.children.map((child) => this.createSubnodeConfiguration(child))
  }

  protected createSubnodeConfiguration(node: ConfigNode): SubnodeConfiguration {
    return new SubnodeConfiguration(this.trackingModel(), node.id, this.viewOptions())
  }

  // ---------------------------------------------------------------------------
  // Listeners
  // ---------------------------------------------------------------------------

  /** Registers the internal listener that detaches views; idempotent. */
  initialize(): void {
    this.model.enableTracking()
  }

  addEventListener(listener: ConfigurationListener): void {
    guard.listener(listener)
    this.model.addListener(listener)
  }

  /** @returns `true` if the listener was registered */
  removeEventListener(listener: ConfigurationListener): boolean {
    return this.model.removeListener(listener)
  }

  getEventListeners(): ConfigurationListener[] {
    return this.model.getListeners()
  }
}

/**
 * Live view anchored at a node of another configuration.
 *
 * Reads see the anchor's current version. Writes are applied to the
 * anchored subtree and installed into the owner; the owner's listeners get
 * the full key, the view's own listeners the key relative to the view.
 *
 * Once the anchor is removed from the owner, whether by another write or
 * by clearAndDetachFromParent(), the view is detached for good: it reads
 * as empty and its writes stay in a private tree.
 */
export class SubnodeConfiguration
  extends HierarchicalConfiguration
  implements NodeTracker
{
  readonly anchorId: NodeId
  private readonly owner: NodeModel
  private anchorName: string
  private detached = false

  constructor(owner: NodeModel, anchorId: NodeId, options: ConfigurationOptions = {}) {
    super(null, options)
    this.owner = owner
    this.anchorId = anchorId
    this.anchorName = owner.locate(anchorId)?.node.name ?? ''
    owner.track(this)
  }

  getRootNode(): ConfigNode {
    return this.anchorLocation()?.node ?? super.getRootNode()
  }

  isDetached(): boolean {
    return this.anchorLocation() === undefined
  }

  anchorRemoved(): void {
    this.detach('removed')
  }

  /**
   * Clears the view, removes its anchor from the owner and detaches it.
   * Later writes through the view never reach the owner.
   */
  clearAndDetachFromParent(): void {
    this.clear()
    const location = this.anchorLocation()
    this.detach('explicit')

    if (location) {
      this.owner.commit(removeSubtree(location), {
        kind: 'clearTree',
        key: eventKey(nodeKey(location)),
      })
    }
  }

  setRootNode(root: ConfigNode): void {
    // Fresh ids keep node identities unique within the owner's tree
    super.setRootNode(copyTree(root))
  }

  protected trackingModel(): NodeModel {
    return this.anchorLocation() ? this.owner : this.model
  }

  protected commitRoot(root: ConfigNode, event: ChangeEvent): void {
    const location = this.anchorLocation()
    if (!location) {
      super.commitRoot(root, event)
      return
    }

    const next = replaceNode(this.owner.root, this.anchorId, adoptIdentity(root, this.anchorId))
    this.owner.commit(next, {
      ...event,
      key: eventKey(joinKeys(nodeKey(location), event.key)),
    })
    this.model.notify(event)
  }

  private anchorLocation(): NodeLocation | undefined {
    if (this.detached) {
      return undefined
    }

    const location = this.owner.locate(this.anchorId)
    if (!location) {
      this.detach('removed')
      return undefined
    }

    this.anchorName = location.node.name
    return location
  }

  private detach(reason: 'removed' | 'explicit'): void {
    if (this.detached) {
      return
    }
    this.detached = true
    this.logger.logDetach(this.anchorName, reason)
    this.model.commit(createNode({ name: this.anchorName }), { kind: 'detach', key: null })
  }
}
