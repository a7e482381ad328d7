/**
 * Student Query Service
 *
 * Read-only joins over the fact table and all four dimensions. Row queries
 * are ordered by student id and always paginated.
 */

import type { Database } from '../db/pool.js';
import type { StudentRow } from '../db/types.js';
import { buildSelectQuery, type WhereCondition } from '../utils/queryBuilder.js';
import type { AcademicLevel, Gender } from '../../etl/categories.js';
import type { Logger } from '../../logger.js';

export interface Page {
  limit: number;
  offset: number;
}

export const DEFAULT_PAGE: Page = { limit: 100, offset: 0 };

const STUDENT_JOIN = `students s
  JOIN genders g ON s.gender_id = g.id
  JOIN academic_levels a ON s.academic_level_id = a.id
  JOIN countries c ON s.country_id = c.id
  JOIN platforms p ON s.platform_id = p.id`;

export const STUDENT_PROJECTION = [
  's.id',
  's.relationship_status',
  's.age',
  's.avg_daily_usage_hours',
  's.affects_academic_performance',
  's.sleep_hours_per_night',
  's.mental_health_score',
  's.conflicts_over_social_media',
  's.addicted_score',
  'g.gender',
  'a.academic_level',
  'c.country_name',
  'p.platform',
] as const;

export class StudentQueryService {
  constructor(
    private readonly db: Database,
    private readonly logger: Logger
  ) {}

  fetchByGenderAndAcademicLevel(
    gender: Gender,
    academicLevel: AcademicLevel,
    page: Page = DEFAULT_PAGE
  ): Promise<StudentRow[]> {
    return this.fetchStudents(
      [
        { column: 'g.gender', operator: '=', value: gender },
        { column: 'a.academic_level', operator: '=', value: academicLevel },
      ],
      page
    );
  }

  async fetchAverageDailyUsage(country: string): Promise<number | null> {
    this.logger.debug('Average daily usage', { country });
    const row = await this.db.queryOne<{ average: number | null }>(
      `SELECT AVG(s.avg_daily_usage_hours)::float AS average
       FROM students s
       JOIN countries c ON s.country_id = c.id
       WHERE c.country_name = $1`,
      [country]
    );
    return row?.average ?? null;
  }

  fetchConflictsOverThreshold(threshold: number, page: Page = DEFAULT_PAGE): Promise<StudentRow[]> {
    return this.fetchStudents(
      [{ column: 's.conflicts_over_social_media', operator: '>', value: threshold }],
      page
    );
  }

  fetchByAffectedFlag(isAffected: boolean, page: Page = DEFAULT_PAGE): Promise<StudentRow[]> {
    return this.fetchStudents(
      [{ column: 's.affects_academic_performance', operator: '=', value: isAffected }],
      page
    );
  }

  fetchByCountryAndMentalHealth(
    country: string,
    mentalHealthScore: number,
    page: Page = DEFAULT_PAGE
  ): Promise<StudentRow[]> {
    return this.fetchStudents(
      [
        { column: 'c.country_name', operator: '=', value: country },
        { column: 's.mental_health_score', operator: '=', value: mentalHealthScore },
      ],
      page
    );
  }

  private fetchStudents(conditions: WhereCondition[], page: Page): Promise<StudentRow[]> {
    const { query, params } = buildSelectQuery(STUDENT_JOIN, STUDENT_PROJECTION, {
      conditions,
      orderBy: { column: 's.id' },
      limit: page.limit,
      offset: page.offset,
    });
    this.logger.debug('Fetching students', {
      filters: Object.fromEntries(conditions.map((c) => [c.column, c.value])),
      ...page,
    });
    return this.db.query<StudentRow>(query, params);
  }
}
