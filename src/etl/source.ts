/**
 * Survey CSV source: reading the file and validating each row.
 */

import { createReadStream } from 'fs';
import csv from 'csv-parser';
import { z } from 'zod';
import { InvalidSourceRowError } from '../errors.js';

const trimmed = z.string().trim().min(1);

const yesNo = z
  .string()
  .trim()
  .transform((value, ctx) => {
    const normalized = value.toLowerCase();
    if (normalized === 'yes' || normalized === 'true') return true;
    if (normalized === 'no' || normalized === 'false') return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected Yes or No' });
    return z.NEVER;
  });

/** A blank cell is an error, not zero. */
const numeric = z.string().trim().min(1, 'value is required').pipe(z.coerce.number().finite());

/** Integer columns; fractional values round as a PostgreSQL integer cast would. */
const roundedInt = numeric.transform((value) => Math.round(value));

export const SourceRowSchema = z.object({
  Student_ID: trimmed,
  Age: roundedInt.pipe(z.number().int().min(0)),
  Gender: trimmed,
  Academic_Level: trimmed,
  Country: trimmed,
  Avg_Daily_Usage_Hours: roundedInt.pipe(z.number().min(0).max(24)),
  Most_Used_Platform: trimmed,
  Affects_Academic_Performance: yesNo,
  Sleep_Hours_Per_Night: numeric.pipe(z.number().min(0).max(24)),
  Mental_Health_Score: roundedInt.pipe(z.number().int().min(1).max(10)),
  Relationship_Status: trimmed,
  Conflicts_Over_Social_Media: roundedInt.pipe(z.number().int().min(0)),
  Addicted_Score: roundedInt.pipe(z.number().int().min(1).max(5)),
});

export type SourceRow = z.infer<typeof SourceRowSchema>;

export function parseSourceRows(records: readonly Record<string, string>[]): SourceRow[] {
  return records.map((record, index) => {
    const result = SourceRowSchema.safeParse(record);
    if (!result.success) {
      // header is line 1
      throw new InvalidSourceRowError(index + 2, result.error.issues);
    }
    return result.data;
  });
}

export function readCsvFile(filePath: string): Promise<Record<string, string>[]> {
  return new Promise((resolve, reject) => {
    const records: Record<string, string>[] = [];
    createReadStream(filePath)
      .on('error', reject)
      .pipe(csv({ mapHeaders: ({ header }) => header.trim() }))
      .on('data', (record: Record<string, string>) => {
        records.push(record);
      })
      .on('end', () => resolve(records))
      .on('error', reject);
  });
}
