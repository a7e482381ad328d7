/**
 * Fact Loader
 *
 * Rewrites validated survey rows into `students` records: categorical columns
 * become foreign keys from the resolved dimension maps, the remaining columns
 * are renamed to their lowercase schema names, and everything is appended in
 * one transaction.
 */

import type { Database } from '../api/db/pool.js';
import type { StudentRecord } from '../api/db/types.js';
import { buildValuesClause } from '../api/utils/queryBuilder.js';
import { IncompleteDimensionMappingError, UnmappedCategoryValueError } from '../errors.js';
import type { Logger } from '../logger.js';
import { toRelationshipStatus } from './categories.js';
import {
  DIMENSION_NAMES,
  DIMENSIONS,
  dimensionKey,
  type DimensionIdMaps,
  type DimensionName,
} from './dimensions.js';
import type { SourceRow } from './source.js';

export const STUDENT_COLUMNS = [
  'gender_id',
  'academic_level_id',
  'country_id',
  'platform_id',
  'relationship_status',
  'age',
  'avg_daily_usage_hours',
  'affects_academic_performance',
  'sleep_hours_per_night',
  'mental_health_score',
  'conflicts_over_social_media',
  'addicted_score',
] as const satisfies readonly (keyof StudentRecord)[];

/** Rows per INSERT statement; 1000 × 12 stays under the 65535 parameter limit. */
export const INSERT_BATCH_SIZE = 1000;

export class FactLoader {
  constructor(
    private readonly db: Database,
    private readonly logger: Logger,
    private readonly table: string = 'students'
  ) {}

  /**
   * Maps every row before writing anything, so a single unmapped value
   * leaves the fact table untouched.
   */
  toRecords(rows: readonly SourceRow[], ids: Partial<DimensionIdMaps>): StudentRecord[] {
    const maps = requireAllDimensions(ids);

    const foreignKey = (name: DimensionName, row: SourceRow): number => {
      const dimension = DIMENSIONS[name];
      const raw = row[dimension.sourceColumn];
      const id = maps[name].get(dimensionKey(dimension, raw));
      if (id === undefined) {
        throw new UnmappedCategoryValueError(dimension.name, raw);
      }
      return id;
    };

    return rows.map((row) => ({
      gender_id: foreignKey('gender', row),
      academic_level_id: foreignKey('academicLevel', row),
      country_id: foreignKey('country', row),
      platform_id: foreignKey('platform', row),
      relationship_status: toRelationshipStatus(row.Relationship_Status),
      age: row.Age,
      avg_daily_usage_hours: row.Avg_Daily_Usage_Hours,
      affects_academic_performance: row.Affects_Academic_Performance,
      sleep_hours_per_night: row.Sleep_Hours_Per_Night,
      mental_health_score: row.Mental_Health_Score,
      conflicts_over_social_media: row.Conflicts_Over_Social_Media,
      addicted_score: row.Addicted_Score,
    }));
  }

  async load(rows: readonly SourceRow[], ids: Partial<DimensionIdMaps>): Promise<number> {
    const records = this.toRecords(rows, ids);
    if (records.length === 0) {
      return 0;
    }

    await this.db.transaction(async (tx) => {
      for (let start = 0; start < records.length; start += INSERT_BATCH_SIZE) {
        const batch = records.slice(start, start + INSERT_BATCH_SIZE);
        const values = buildValuesClause(batch, STUDENT_COLUMNS);
        await tx.query(
          `INSERT INTO ${this.table} (${STUDENT_COLUMNS.join(', ')}) ${values.clause}`,
          values.params
        );
      }
    });

    this.logger.info('Appended student rows', { table: this.table, rows: records.length });
    return records.length;
  }
}

function requireAllDimensions(ids: Partial<DimensionIdMaps>): DimensionIdMaps {
  const { gender, academicLevel, country, platform } = ids;
  if (
    gender === undefined ||
    gender.size === 0 ||
    academicLevel === undefined ||
    academicLevel.size === 0 ||
    country === undefined ||
    country.size === 0 ||
    platform === undefined ||
    platform.size === 0
  ) {
    const missing = DIMENSION_NAMES.filter((name) => {
      const map = ids[name];
      return map === undefined || map.size === 0;
    });
    throw new IncompleteDimensionMappingError(missing);
  }
  return { gender, academicLevel, country, platform };
}
