/**
 * Shared test fixtures
 *
 * A small database schema used across the configuration tests:
 *
 * ```
 * tables
 *   table            (customers)
 *     name
 *     fields
 *       field (x5)
 *         name
 *   table            (orders)
 *     ...
 * ```
 */

import { HierarchicalConfiguration } from '~/configuration/hierarchical-configuration'
import type { ConfigurationOptions } from '~/core/types'
import { buildTreeFromObject } from '~/tree/build-tree'
import type { ConfigNode } from '~/tree/types'

export const TABLES = [
  {
    name: 'customers',
    fields: ['id', 'fullName', 'region', 'createdAt', 'status'],
  },
  {
    name: 'orders',
    fields: ['orderId', 'customerId', 'total', 'placedAt', 'channel'],
  },
] as const

export const tableName = (table: number): string => TABLES[table]?.name ?? ''

export const fieldName = (table: number, field: number): string =>
  TABLES[table]?.fields[field] ?? ''

export const fieldCount = (table: number): number =>
  TABLES[table]?.fields.length ?? 0

export const createTablesTree = (): ConfigNode =>
  buildTreeFromObject({
    tables: {
      table: TABLES.map((table) => ({
        name: table.name,
        fields: { field: table.fields.map((field) => ({ name: field })) },
      })),
    },
  })

export const createTablesConfiguration = (
  options?: ConfigurationOptions,
): HierarchicalConfiguration =>
  new HierarchicalConfiguration(createTablesTree(), options)

/** Asserts that a configuration holds the complete tables fixture. */
export const expectTablesContent = (config: {
  getString(key: string): string | undefined
}): void => {
  TABLES.forEach((table, i) => {
    expect(config.getString(`tables.table(${String(i)}).name`)).toBe(table.name)
    table.fields.forEach((field, j) => {
      expect(
        config.getString(`tables.table(${String(i)}).fields.field(${String(j)}).name`),
      ).toBe(field)
    })
  })
}
