import { describe, expect, it } from 'vitest'

import { parseKey } from '~/key/key-parser'
import {
  addChildren,
  addPath,
  clearRoot,
  editNodes,
  removeSubtree,
  replaceNode,
  setNodeValue,
} from '~/tree/mutations'
import { createNode, withValue } from '~/tree/node'
import {
  collectValues,
  prepareAdd,
  resolveKey,
  resolveSingle,
} from '~/tree/resolver'
import type { ConfigNode } from '~/tree/types'
import { buildTreeFromObject } from '~/tree/build-tree'
import { createTablesTree } from '../mocks/fixtures'

const valuesOf = (root: ConfigNode, key: string): unknown[] =>
  collectValues(resolveKey(root, parseKey(key)))

const single = (root: ConfigNode, key: string) => resolveSingle(root, parseKey(key))

describe('setNodeValue', () => {
  it('should produce a new root and leave the old snapshot alone', () => {
    const root = createTablesTree()
    const next = setNodeValue(single(root, 'tables.table(0).name'), 'clients')

    expect(valuesOf(next, 'tables.table.name')).toEqual(['clients', 'orders'])
    expect(valuesOf(root, 'tables.table.name')).toEqual(['customers', 'orders'])
  })

  it('should keep identities along the edited path', () => {
    const root = createTablesTree()
    const table = single(root, 'tables.table(0)').node
    const next = setNodeValue(single(root, 'tables.table(0).name'), 'clients')

    expect(next.id).toBe(root.id)
    expect(single(next, 'tables.table(0)').node.id).toBe(table.id)
  })

  it('should share untouched subtrees', () => {
    const root = createTablesTree()
    const orders = single(root, 'tables.table(1)').node
    const next = setNodeValue(single(root, 'tables.table(0).name'), 'clients')

    expect(single(next, 'tables.table(1)').node).toBe(orders)
  })

  it('should set attribute values', () => {
    const root = buildTreeFromObject({ db: { '@vendor': 'sqlite' } })
    const [location] = resolveKey(root, parseKey('db[@vendor]'))
    if (!location) throw new Error('attribute not resolved')

    const next = setNodeValue(location, 'postgres')

    expect(valuesOf(next, 'db[@vendor]')).toEqual(['postgres'])
  })
})

describe('addPath', () => {
  it('should append a sibling for an existing key', () => {
    const root = createTablesTree()
    const next = addPath(prepareAdd(root, parseKey('tables.table.name')), 'extra')

    expect(valuesOf(next, 'tables.table(1).name')).toEqual(['orders', 'extra'])
  })

  it('should synthesize missing intermediate nodes', () => {
    const root = createTablesTree()
    const next = addPath(
      prepareAdd(root, parseKey('tables.table(0).indexes.index.name')),
      'idx_region',
    )

    expect(valuesOf(next, 'tables.table(0).indexes.index.name')).toEqual(['idx_region'])
  })

  it('should place children below the new node', () => {
    const root = createNode()
    const next = addPath(prepareAdd(root, parseKey('a.b')), undefined, [
      createNode({ name: 'c', value: 1 }),
    ])

    expect(valuesOf(next, 'a.b.c')).toEqual([1])
  })

  it('should make an existing attribute multi-valued', () => {
    const root = buildTreeFromObject({ db: { '@tag': 'a' } })
    const first = addPath(prepareAdd(root, parseKey('db[@tag]')), 'b')
    const second = addPath(prepareAdd(first, parseKey('db[@tag]')), 'c')

    expect(second.children[0]?.attributes.get('tag')).toEqual(['a', 'b', 'c'])
  })

  it('should create the owner node of a new attribute', () => {
    const root = createNode()
    const next = addPath(prepareAdd(root, parseKey('db.pool[@size]')), 5)

    expect(valuesOf(next, 'db.pool[@size]')).toEqual([5])
  })
})

describe('addChildren', () => {
  it('should append children to an existing node', () => {
    const root = createTablesTree()
    const next = addChildren(single(root, 'tables'), [
      createNode({ name: 'view', value: 'v_orders' }),
    ])

    expect(valuesOf(next, 'tables.view')).toEqual(['v_orders'])
    expect(valuesOf(root, 'tables.view')).toEqual([])
  })
})

describe('removeSubtree', () => {
  it('should detach a node', () => {
    const root = createTablesTree()
    const next = removeSubtree(single(root, 'tables.table(0)'))

    expect(valuesOf(next, 'tables.table.name')).toEqual(['orders'])
  })

  it('should remove an attribute', () => {
    const root = buildTreeFromObject({ db: { '@vendor': 'sqlite', file: 'app.db' } })
    const [location] = resolveKey(root, parseKey('db[@vendor]'))
    if (!location) throw new Error('attribute not resolved')

    const next = removeSubtree(location)

    expect(valuesOf(next, 'db[@vendor]')).toEqual([])
    expect(valuesOf(next, 'db.file')).toEqual(['app.db'])
  })

  it('should clear the root instead of removing it', () => {
    const root = createTablesTree()
    const next = removeSubtree(single(root, ''))

    expect(next.id).toBe(root.id)
    expect(next.children).toEqual([])
  })
})

describe('clearRoot', () => {
  it('should empty the root and keep its identity', () => {
    const root = createTablesTree()
    const next = clearRoot(root)

    expect(next.id).toBe(root.id)
    expect(next.name).toBe(root.name)
    expect(next.children).toHaveLength(0)
  })
})

describe('editNodes', () => {
  it('should apply several edits in one pass', () => {
    const root = createTablesTree()
    const first = single(root, 'tables.table(0).name').node
    const second = single(root, 'tables.table(1).name').node

    const next = editNodes(
      root,
      new Map([
        [first.id, (node: ConfigNode) => withValue(node, 'a')],
        [second.id, (node: ConfigNode) => withValue(node, 'b')],
      ]),
    )

    expect(valuesOf(next, 'tables.table.name')).toEqual(['a', 'b'])
  })

  it('should prune edited nodes left empty', () => {
    const root = createTablesTree()
    const name = single(root, 'tables.table(1).name').node
    const clear = (node: ConfigNode) => withValue(node, undefined)

    const kept = editNodes(root, new Map([[name.id, clear]]))
    const pruned = editNodes(root, new Map([[name.id, clear]]), { prune: true })

    expect(resolveKey(kept, parseKey('tables.table(1).name'))).toHaveLength(1)
    expect(resolveKey(pruned, parseKey('tables.table(1).name'))).toHaveLength(0)
  })

  it('should return the same root when no edited node is part of it', () => {
    const root = createTablesTree()
    const stranger = createNode()

    expect(editNodes(root, new Map([[stranger.id, () => null]]))).toBe(root)
  })
})

describe('replaceNode', () => {
  it('should remove a node by identity', () => {
    const root = createTablesTree()
    const table = single(root, 'tables.table(1)').node

    const next = replaceNode(root, table.id, null)

    expect(valuesOf(next, 'tables.table.name')).toEqual(['customers'])
  })
})
