import type {
  AcademicLevel,
  Gender,
  Platform,
  RelationshipStatus,
} from '../../etl/categories.js';

/** A row of the `students` fact table as written by the importer. */
export interface StudentRecord {
  gender_id: number;
  academic_level_id: number;
  country_id: number;
  platform_id: number;
  relationship_status: RelationshipStatus;
  age: number;
  avg_daily_usage_hours: number;
  affects_academic_performance: boolean;
  sleep_hours_per_night: number;
  mental_health_score: number;
  conflicts_over_social_media: number;
  addicted_score: number;
}

/** Denormalized student row returned by every read query. */
export interface StudentRow {
  id: number;
  relationship_status: RelationshipStatus;
  age: number;
  avg_daily_usage_hours: number;
  affects_academic_performance: boolean;
  sleep_hours_per_night: number;
  mental_health_score: number;
  conflicts_over_social_media: number;
  addicted_score: number;
  gender: Gender;
  academic_level: AcademicLevel;
  country_name: string;
  platform: Platform;
}

export interface DimensionRow {
  id: number;
  value: string;
}
