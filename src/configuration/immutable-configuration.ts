/**
 * Read-only views
 *
 * @module configuration/immutable-configuration
 */

import type { ResolvedOptions } from '../core/defaults'
import { NodeModel, type NodeTracker } from '../model/node-model'
import { createNode } from '../tree/node'
import type { ConfigNode, NodeId } from '../tree/types'
import { guard } from '../utils/guards'
import { AbstractHierarchicalConfiguration } from './abstract-configuration'
import { HierarchicalConfiguration } from './hierarchical-configuration'
import type { ViewSource } from './types'

/**
 * Configuration that can be read but never written.
 *
 * A snapshot view holds a fixed subtree: later edits of the configuration
 * it came from are invisible. A tracked view is anchored at a node of a
 * live model and reads that node's current version; once the node is
 * removed the view is detached for good and reads as empty.
 *
 * Every write method throws ReadOnlyConfigurationError.
 */
export class ImmutableHierarchicalConfiguration
  extends AbstractHierarchicalConfiguration
  implements NodeTracker
{
  private readonly source: ViewSource
  private detachedRoot: ConfigNode | null = null
  private snapshotModel: NodeModel | null = null
  private anchorName = ''

  constructor(source: ViewSource, options: ResolvedOptions) {
    super(options)
    this.source = source
    if (source.kind === 'tracked') {
      this.anchorName = source.model.locate(source.anchorId)?.node.name ?? ''
      source.model.track(this)
    }
  }

  /** Identity of the anchor node (snapshot views: their root). */
  get anchorId(): NodeId {
    return this.source.kind === 'tracked'
      ? this.source.anchorId
      : this.source.root.id
  }

  /** True once a tracked view lost its anchor. */
  isDetached(): boolean {
    return this.detachedRoot !== null
  }

  anchorRemoved(): void {
    if (this.source.kind === 'tracked' && !this.detachedRoot) {
      this.detachedRoot = createNode({ name: this.anchorName })
      this.logger.logDetach(this.anchorName, 'removed')
    }
  }

  getRootNode(): ConfigNode {
    if (this.source.kind === 'snapshot') {
      return this.source.root
    }
    if (this.detachedRoot) {
      return this.detachedRoot
    }

    const location = this.source.model.locate(this.source.anchorId)
    if (!location) {
      this.anchorRemoved()
      return this.detachedRoot ?? createNode({ name: this.anchorName })
    }
    this.anchorName = location.node.name
    return location.node
  }

  protected trackingModel(): NodeModel {
    if (this.source.kind === 'tracked' && !this.detachedRoot) {
      return this.source.model
    }
    // Snapshots never change; a private model is enough to anchor views in
    if (!this.snapshotModel) {
      this.snapshotModel = new NodeModel(this.getRootNode(), this.logger)
    }
    return this.snapshotModel
  }

  protected createSubset(root: ConfigNode): HierarchicalConfiguration {
    return new HierarchicalConfiguration(root, this.viewOptions())
  }

  protected createImmutableView(
    source: ViewSource,
  ): ImmutableHierarchicalConfiguration {
    return new ImmutableHierarchicalConfiguration(source, this.viewOptions())
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  setProperty(_key: string | null, _value: unknown): never {
    return guard.readOnly('setProperty')
  }

  addProperty(_key: string | null, _value: unknown): never {
    return guard.readOnly('addProperty')
  }

  addNodes(_key: string | null, _nodes: readonly ConfigNode[]): never {
    return guard.readOnly('addNodes')
  }

  clearProperty(_key: string | null): never {
    return guard.readOnly('clearProperty')
  }

  clearTree(_key: string | null): never {
    return guard.readOnly('clearTree')
  }

  clear(): never {
    return guard.readOnly('clear')
  }

  setRootNode(_root: ConfigNode): never {
    return guard.readOnly('setRootNode')
  }
}
