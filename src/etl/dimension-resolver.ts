/**
 * Dimension Resolver
 *
 * Find-or-create for dimension rows: existing values are looked up first and
 * only the unseen ones are inserted, so repeated imports never duplicate a
 * dimension value.
 */

import type { DimensionRow } from '../api/db/types.js';
import type { Database, Queryable } from '../api/db/pool.js';
import { buildValuesClause, buildWhereClause } from '../api/utils/queryBuilder.js';
import { TableNotFoundError } from '../errors.js';
import type { Logger } from '../logger.js';
import { dimensionKey, type Dimension, type DimensionIds } from './dimensions.js';

const UNDEFINED_TABLE = '42P01';

function isUndefinedTable(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNDEFINED_TABLE
  );
}

export class DimensionResolver {
  constructor(
    private readonly db: Database,
    private readonly logger: Logger
  ) {}

  /**
   * Returns `key → id` for every distinct value in `values`, where the key is
   * the normalized value lowercased.
   */
  async resolve(dimension: Dimension, values: readonly string[]): Promise<DimensionIds> {
    // key → value to store; the first spelling of a free-text value wins
    const pending = new Map<string, string>();
    for (const raw of values) {
      const key = dimensionKey(dimension, raw);
      if (!pending.has(key)) {
        pending.set(key, dimension.normalize(raw));
      }
    }

    const ids: DimensionIds = new Map();
    if (pending.size === 0) {
      return ids;
    }

    try {
      await this.db.transaction(async (tx) => {
        for (const row of await this.findExisting(tx, dimension, [...pending.keys()])) {
          ids.set(row.value.toLowerCase(), row.id);
        }

        const missing = [...pending.entries()]
          .filter(([key]) => !ids.has(key))
          .map(([, value]) => ({ value }));

        let inserted: DimensionRow[] = [];
        if (missing.length > 0) {
          const values = buildValuesClause(missing, ['value']);
          inserted = await tx.query<DimensionRow>(
            `INSERT INTO ${dimension.table} (${dimension.column}) ${values.clause}
             ON CONFLICT (${dimension.column}) DO NOTHING
             RETURNING id, ${dimension.column} AS value`,
            values.params
          );
          for (const row of inserted) {
            ids.set(row.value.toLowerCase(), row.id);
          }
        }

        // rows a concurrent import committed between the lookup and the insert
        const raced = [...pending.keys()].filter((key) => !ids.has(key));
        if (raced.length > 0) {
          for (const row of await this.findExisting(tx, dimension, raced)) {
            ids.set(row.value.toLowerCase(), row.id);
          }
        }

        this.logger.debug('Resolved dimension values', {
          table: dimension.table,
          existing: pending.size - missing.length,
          inserted: inserted.length,
          raced: raced.length,
        });
      });
    } catch (error) {
      if (isUndefinedTable(error)) {
        throw new TableNotFoundError(dimension.table);
      }
      throw error;
    }

    return ids;
  }

  private findExisting(
    tx: Queryable,
    dimension: Dimension,
    keys: string[]
  ): Promise<DimensionRow[]> {
    // enum codes are stored uppercase; free text is matched case-insensitively
    const where = dimension.enumerated
      ? buildWhereClause([
          { column: dimension.column, operator: 'IN', value: keys.map((key) => key.toUpperCase()) },
        ])
      : buildWhereClause([{ column: `lower(${dimension.column})`, operator: 'IN', value: keys }]);

    return tx.query<DimensionRow>(
      `SELECT id, ${dimension.column} AS value FROM ${dimension.table} ${where.clause}`,
      where.params
    );
  }
}
