import { describe, expect, it, vi } from 'vitest'

import type { ChangeEvent } from '~/core/types'
import { NodeModel, type NodeTracker } from '~/model/node-model'
import { parseKey } from '~/key/key-parser'
import { replaceNode } from '~/tree/mutations'
import { createNode } from '~/tree/node'
import { resolveSingle } from '~/tree/resolver'
import { createLogger } from '~/utils/log'
import { createTablesTree } from '../mocks/fixtures'

const logger = createLogger({ log: false })

const event: ChangeEvent = { kind: 'setProperty', key: 'a' }

const createTracker = (anchorId: number) => {
  const tracker: NodeTracker & { removed: number } = {
    anchorId,
    removed: 0,
    anchorRemoved() {
      tracker.removed++
    },
  }
  return tracker
}

describe('NodeModel', () => {
  describe('commits', () => {
    it('should install the new root before notifying', () => {
      const model = new NodeModel(createNode(), logger)
      const next = createNode({ name: 'next' })
      const seen: string[] = []
      model.addListener(() => seen.push(model.root.name))

      model.commit(next, event)

      expect(model.root).toBe(next)
      expect(seen).toEqual(['next'])
    })

    it('should call listeners in registration order', () => {
      const calls: string[] = []
      const model = new NodeModel(createNode(), logger, [() => calls.push('first')])
      model.addListener(() => calls.push('second'))

      model.notify(event)

      expect(calls).toEqual(['first', 'second'])
    })

    it('should pass the event through', () => {
      const listener = vi.fn()
      const model = new NodeModel(createNode(), logger, [listener])

      model.notify(event)

      expect(listener).toHaveBeenCalledWith(event)
    })

    it('should not call a listener removed during notification', () => {
      const model = new NodeModel(createNode(), logger)
      const late = vi.fn()
      model.addListener(() => model.removeListener(late))
      model.addListener(late)

      model.notify(event)
      model.notify(event)

      // The first round iterates over a copy taken before the removal
      expect(late).toHaveBeenCalledTimes(1)
    })
  })

  describe('listeners', () => {
    it('should report whether a listener was removed', () => {
      const listener = vi.fn()
      const model = new NodeModel(createNode(), logger, [listener])

      expect(model.removeListener(listener)).toBe(true)
      expect(model.removeListener(listener)).toBe(false)
      expect(model.getListeners()).toEqual([])
    })

    it('should return a copy of the listeners', () => {
      const model = new NodeModel(createNode(), logger, [vi.fn()])
      model.getListeners().length = 0

      expect(model.getListeners()).toHaveLength(1)
    })
  })

  describe('tracking', () => {
    it('should install the sync listener once, ahead of the others', () => {
      const listener = vi.fn()
      const model = new NodeModel(createNode(), logger, [listener])

      model.enableTracking()
      model.enableTracking()

      const listeners = model.getListeners()
      expect(listeners).toHaveLength(2)
      expect(listeners[1]).toBe(listener)
    })

    it('should tell trackers whose anchor was removed', () => {
      const root = createTablesTree()
      const model = new NodeModel(root, logger)
      const table = resolveSingle(root, parseKey('tables.table(0)')).node
      const other = resolveSingle(root, parseKey('tables.table(1)')).node
      const removed = createTracker(table.id)
      const kept = createTracker(other.id)
      model.track(removed)
      model.track(kept)

      model.commit(replaceNode(root, table.id, null), event)

      expect(removed.removed).toBe(1)
      expect(kept.removed).toBe(0)
      expect(model.trackedCount).toBe(1)
    })

    it('should detach trackers before other listeners run', () => {
      const root = createTablesTree()
      const table = resolveSingle(root, parseKey('tables.table(0)')).node
      const tracker = createTracker(table.id)
      const seen: number[] = []
      const model = new NodeModel(root, logger, [() => seen.push(tracker.removed)])
      model.track(tracker)

      model.commit(replaceNode(root, table.id, null), event)

      expect(seen).toEqual([1])
    })

    it('should locate nodes in the current root', () => {
      const root = createTablesTree()
      const model = new NodeModel(root, logger)
      const table = resolveSingle(root, parseKey('tables.table(1)')).node

      expect(model.locate(table.id)?.node).toBe(table)

      model.commit(replaceNode(root, table.id, null), event)

      expect(model.locate(table.id)).toBeUndefined()
    })
  })
})
