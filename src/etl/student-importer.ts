/**
 * Student Importer
 *
 * CSV file → dimension id maps → fact rows. Each dimension is resolved in its
 * own transaction and the fact rows in a final one; a failure part-way leaves
 * only reusable dimension rows behind.
 */

import type { Logger } from '../logger.js';
import type { DimensionResolver } from './dimension-resolver.js';
import { DIMENSION_NAMES, DIMENSIONS, type DimensionIdMaps, type DimensionName } from './dimensions.js';
import type { FactLoader } from './fact-loader.js';
import { parseSourceRows, readCsvFile, type SourceRow } from './source.js';

export interface ImportSummary {
  rows_inserted: number;
  /** Distinct values resolved per dimension. */
  dimensions: Record<DimensionName, number>;
}

export class StudentImporter {
  constructor(
    private readonly resolver: DimensionResolver,
    private readonly loader: FactLoader,
    private readonly logger: Logger,
    private readonly readRecords: (filePath: string) => Promise<Record<string, string>[]> = readCsvFile
  ) {}

  async importFile(filePath: string): Promise<ImportSummary> {
    this.logger.info('Reading survey file', { filePath });
    const rows = parseSourceRows(await this.readRecords(filePath));
    return this.importRows(rows);
  }

  async importRows(rows: readonly SourceRow[]): Promise<ImportSummary> {
    if (rows.length === 0) {
      this.logger.warn('Nothing to import');
      return {
        rows_inserted: 0,
        dimensions: { gender: 0, academicLevel: 0, country: 0, platform: 0 },
      };
    }

    const ids: DimensionIdMaps = {
      gender: new Map(),
      academicLevel: new Map(),
      country: new Map(),
      platform: new Map(),
    };

    for (const name of DIMENSION_NAMES) {
      const dimension = DIMENSIONS[name];
      const distinct = [...new Set(rows.map((row) => row[dimension.sourceColumn]))];
      ids[name] = await this.resolver.resolve(dimension, distinct);
      this.logger.debug('Dimension ids', { dimension: name, ids: Object.fromEntries(ids[name]) });
    }

    const inserted = await this.loader.load(rows, ids);

    return {
      rows_inserted: inserted,
      dimensions: {
        gender: ids.gender.size,
        academicLevel: ids.academicLevel.size,
        country: ids.country.size,
        platform: ids.platform.size,
      },
    };
  }
}
