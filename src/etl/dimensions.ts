/**
 * Dimension table definitions for the student star schema.
 */

import { toAcademicLevel, toGender, toPlatform } from './categories.js';

export type DimensionName = 'gender' | 'academicLevel' | 'country' | 'platform';

export type SourceColumn = 'Gender' | 'Academic_Level' | 'Country' | 'Most_Used_Platform';

export interface Dimension {
  name: DimensionName;
  table: 'genders' | 'academic_levels' | 'countries' | 'platforms';
  /** Value column of the dimension table. */
  column: 'gender' | 'academic_level' | 'country_name' | 'platform';
  /** Foreign key column on `students`. */
  foreignKey: 'gender_id' | 'academic_level_id' | 'country_id' | 'platform_id';
  sourceColumn: SourceColumn;
  /** Whether stored values are enum codes rather than free text. */
  enumerated: boolean;
  /** Value written to the dimension table. */
  normalize(raw: string): string;
}

/** Lookup key shared by the resolver and the fact loader. */
export function dimensionKey(dimension: Dimension, raw: string): string {
  return dimension.normalize(raw).toLowerCase();
}

export const DIMENSIONS: Record<DimensionName, Dimension> = {
  gender: {
    name: 'gender',
    table: 'genders',
    column: 'gender',
    foreignKey: 'gender_id',
    sourceColumn: 'Gender',
    enumerated: true,
    normalize: toGender,
  },
  academicLevel: {
    name: 'academicLevel',
    table: 'academic_levels',
    column: 'academic_level',
    foreignKey: 'academic_level_id',
    sourceColumn: 'Academic_Level',
    enumerated: true,
    normalize: toAcademicLevel,
  },
  country: {
    name: 'country',
    table: 'countries',
    column: 'country_name',
    foreignKey: 'country_id',
    sourceColumn: 'Country',
    enumerated: false,
    normalize: (raw) => raw.trim(),
  },
  platform: {
    name: 'platform',
    table: 'platforms',
    column: 'platform',
    foreignKey: 'platform_id',
    sourceColumn: 'Most_Used_Platform',
    enumerated: true,
    normalize: toPlatform,
  },
};

export const DIMENSION_NAMES: readonly DimensionName[] = [
  'gender',
  'academicLevel',
  'country',
  'platform',
];

/** `normalized-lowercase value → dimension row id` */
export type DimensionIds = Map<string, number>;

export type DimensionIdMaps = Record<DimensionName, DimensionIds>;
