import { z } from 'zod';
import { toAcademicLevel, toGender } from '../../etl/categories.js';
import { PaginationSchema } from './common.js';

const CountrySchema = z.string().trim().min(1).max(200);

/** Accepts any spelling the importer accepts (`"High School"`, `"male"`). */
const GenderSchema = z.string().min(1).transform(toGender);
const AcademicLevelSchema = z.string().min(1).transform(toAcademicLevel);

export const GenderAndAcademicLevelSchema = PaginationSchema.extend({
  gender: GenderSchema,
  academic_level: AcademicLevelSchema,
});

export const CountryBodySchema = z.object({
  country: CountrySchema,
});

export const ThresholdSchema = PaginationSchema.extend({
  threshold: z.number().int(),
});

export const AffectedFlagSchema = PaginationSchema.extend({
  is_affected: z.boolean(),
});

export const CountryAndMentalHealthSchema = PaginationSchema.extend({
  country: CountrySchema,
  mental_health_score: z.number().int().min(1).max(10),
});

export const PromptRequestSchema = z.object({
  prompt: z.string().min(1).max(100_000),
  template_name: z.string().regex(/^[\w-]+$/, 'template name may only contain letters, digits, _ and -'),
});
