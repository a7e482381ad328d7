import { describe, it, expect, beforeEach } from 'vitest';
import { IncompleteDimensionMappingError, UnmappedCategoryValueError } from '../../errors.js';
import {
  createMemoryDatabase,
  csvRecord,
  silentLogger,
  type MemoryDatabase,
} from '../../__tests__/helpers.js';
import type { DimensionIdMaps } from '../dimensions.js';
import { FactLoader } from '../fact-loader.js';
import { parseSourceRows } from '../source.js';

async function seedDimensions(memory: MemoryDatabase): Promise<DimensionIdMaps> {
  await memory.db.query(`INSERT INTO genders (gender) VALUES ('FEMALE'), ('MALE')`);
  await memory.db.query(`INSERT INTO academic_levels (academic_level) VALUES ('UNDERGRADUATE'), ('HIGH_SCHOOL')`);
  await memory.db.query(`INSERT INTO countries (country_name) VALUES ('Poland')`);
  await memory.db.query(`INSERT INTO platforms (platform) VALUES ('INSTAGRAM'), ('TIK_TOK')`);
  return {
    gender: new Map([
      ['female', 1],
      ['male', 2],
    ]),
    academicLevel: new Map([
      ['undergraduate', 1],
      ['high_school', 2],
    ]),
    country: new Map([['poland', 1]]),
    platform: new Map([
      ['instagram', 1],
      ['tik_tok', 2],
    ]),
  };
}

describe('FactLoader', () => {
  let memory: MemoryDatabase;
  let loader: FactLoader;

  beforeEach(() => {
    memory = createMemoryDatabase();
    loader = new FactLoader(memory.db, silentLogger());
  });

  it('rewrites categorical columns into foreign keys', async () => {
    const ids = await seedDimensions(memory);
    const rows = parseSourceRows([
      csvRecord({
        Gender: ' male',
        Academic_Level: 'High School',
        Most_Used_Platform: 'TikTok',
        Relationship_Status: 'In Relationship',
        Affects_Academic_Performance: 'No',
        Avg_Daily_Usage_Hours: '5.6',
      }),
    ]);

    expect(loader.toRecords(rows, ids)).toEqual([
      {
        gender_id: 2,
        academic_level_id: 2,
        country_id: 1,
        platform_id: 2,
        relationship_status: 'IN_RELATIONSHIP',
        age: 20,
        avg_daily_usage_hours: 6,
        affects_academic_performance: false,
        sleep_hours_per_night: 7,
        mental_health_score: 6,
        conflicts_over_social_media: 2,
        addicted_score: 3,
      },
    ]);
  });

  it('appends every row to the fact table', async () => {
    const ids = await seedDimensions(memory);
    const rows = parseSourceRows([
      csvRecord({ Student_ID: '1' }),
      csvRecord({ Student_ID: '2', Gender: 'Male' }),
      csvRecord({ Student_ID: '3', Sleep_Hours_Per_Night: '6.5' }),
    ]);

    expect(await loader.load(rows, ids)).toBe(3);
    expect(await memory.count('students')).toBe(3);

    const stored = await memory.db.query<{ gender_id: number; sleep_hours_per_night: number }>(
      'SELECT gender_id, sleep_hours_per_night FROM students ORDER BY id'
    );
    expect(stored).toEqual([
      { gender_id: 1, sleep_hours_per_night: 7 },
      { gender_id: 2, sleep_hours_per_night: 7 },
      { gender_id: 1, sleep_hours_per_night: 6.5 },
    ]);
  });

  it('requires all four dimension maps', async () => {
    const ids = await seedDimensions(memory);
    const rows = parseSourceRows([csvRecord()]);

    expect(() => loader.toRecords(rows, { ...ids, country: new Map() })).toThrow(
      IncompleteDimensionMappingError
    );
    expect(() => loader.toRecords(rows, { gender: ids.gender, academicLevel: ids.academicLevel })).toThrow(
      'Dimension ids missing for: country, platform'
    );
  });

  it('fails on a value that was not resolved and writes nothing', async () => {
    const ids = await seedDimensions(memory);
    const rows = parseSourceRows([csvRecord(), csvRecord({ Country: 'Chile' })]);

    await expect(loader.load(rows, ids)).rejects.toBeInstanceOf(UnmappedCategoryValueError);
    expect(await memory.count('students')).toBe(0);
  });
});
