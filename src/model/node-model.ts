/**
 * Node Model
 *
 * Holds the current root snapshot of one configuration tree. Every change
 * is committed as a whole new root; readers that grabbed the previous root
 * keep a consistent, unchanged tree.
 *
 * The model also knows which views are anchored in its tree. Tracking
 * installs an internal listener ahead of all others; after each commit it
 * checks the anchors by identity and tells the views whose anchor is gone,
 * so that they detach before any other listener runs.
 *
 * @module model/node-model
 */

import type { ChangeEvent, ConfigurationListener } from '../core/types'
import { containsNode, locateNode } from '../tree/resolver'
import type { ConfigNode, NodeId, NodeLocation } from '../tree/types'
import type { ConfigurationLogger } from '../utils/log'

/** A view anchored at a node of a model's tree. */
export interface NodeTracker {
  readonly anchorId: NodeId
  /** Called once, after the commit that removed the anchor. */
  anchorRemoved(): void
}

export class NodeModel {
  private current: ConfigNode
  private readonly listeners: ConfigurationListener[] = []
  // Views are tracked weakly; an abandoned view drops out on the next commit
  private readonly trackers = new Set<WeakRef<NodeTracker>>()

  constructor(
    root: ConfigNode,
    private readonly logger: ConfigurationLogger,
    listeners: readonly ConfigurationListener[] = [],
  ) {
    this.current = root
    this.listeners.push(...listeners)
  }

  get root(): ConfigNode {
    return this.current
  }

  /** Installs a new root and notifies the listeners. */
  commit(root: ConfigNode, event: ChangeEvent): void {
    this.current = root
    this.notify(event)
  }

  /** Notifies the listeners without changing the root. */
  notify(event: ChangeEvent): void {
    this.logger.logChange(event, this.current)
    for (const listener of [...this.listeners]) {
      listener(event)
    }
  }

  locate(id: NodeId): NodeLocation | undefined {
    return locateNode(this.current, id)
  }

  // ---------------------------------------------------------------------------
  // Trackers
  // ---------------------------------------------------------------------------

  private readonly syncListener: ConfigurationListener = () => {
    this.syncTrackers()
  }

  /** Installs the tracker sync listener; repeated calls are no-ops. */
  enableTracking(): void {
    if (!this.listeners.includes(this.syncListener)) {
      this.listeners.unshift(this.syncListener)
    }
  }

  track(tracker: NodeTracker): void {
    this.enableTracking()
    this.trackers.add(new WeakRef(tracker))
  }

  get trackedCount(): number {
    return this.trackers.size
  }

  private syncTrackers(): void {
    const removed: NodeTracker[] = []

    for (const ref of this.trackers) {
      const tracker = ref.deref()
      if (!tracker) {
        this.trackers.delete(ref)
      } else if (!containsNode(this.current, tracker.anchorId)) {
        this.trackers.delete(ref)
        removed.push(tracker)
      }
    }

    for (const tracker of removed) {
      tracker.anchorRemoved()
    }
  }

  // ---------------------------------------------------------------------------
  // Listeners
  // ---------------------------------------------------------------------------

  addListener(listener: ConfigurationListener): void {
    this.listeners.push(listener)
  }

  /** @returns `true` if the listener was registered */
  removeListener(listener: ConfigurationListener): boolean {
    const index = this.listeners.indexOf(listener)
    if (index < 0) {
      return false
    }
    this.listeners.splice(index, 1)
    return true
  }

  getListeners(): ConfigurationListener[] {
    return [...this.listeners]
  }
}
