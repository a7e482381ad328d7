import { Router, type NextFunction, type Request, type Response } from 'express';
import type { StudentImporter } from '../../etl/student-importer.js';
import type { Logger } from '../../logger.js';
import type { StudentQueryService } from '../queries/student-queries.js';
import type { StudentRow } from '../db/types.js';
import type { Pagination } from '../schemas/common.js';
import {
  AffectedFlagSchema,
  CountryAndMentalHealthSchema,
  CountryBodySchema,
  GenderAndAcademicLevelSchema,
  ThresholdSchema,
} from '../schemas/students.js';

export interface StudentsRouterDependencies {
  importer: StudentImporter;
  queries: StudentQueryService;
  csvPath: string;
  logger: Logger;
}

function page(res: Response, rows: StudentRow[], { limit, offset }: Pagination): void {
  res.json({
    status: 'success',
    data: rows,
    meta: { count: rows.length, limit, offset },
  });
}

export function createStudentsRouter(deps: StudentsRouterDependencies): Router {
  const { importer, queries, csvPath, logger } = deps;
  const router = Router();

  // POST /students/import
  router.post('/import', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      logger.info('Starting import', { csvPath });
      const summary = await importer.importFile(csvPath);
      logger.info('Finished import', { ...summary });
      res.json({ status: 'success', message: 'import completed', ...summary });
    } catch (error) {
      next(error);
    }
  });

  // POST /students/fetch_by_gender_and_level
  router.post('/fetch_by_gender_and_level', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { gender, academic_level, ...pagination } = GenderAndAcademicLevelSchema.parse(req.body);
      const rows = await queries.fetchByGenderAndAcademicLevel(gender, academic_level, pagination);
      page(res, rows, pagination);
    } catch (error) {
      next(error);
    }
  });

  // POST /students/fetch_daily_use_for_country
  router.post('/fetch_daily_use_for_country', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { country } = CountryBodySchema.parse(req.body);
      const average = await queries.fetchAverageDailyUsage(country);
      res.json({ status: 'success', country, average });
    } catch (error) {
      next(error);
    }
  });

  // POST /students/fetch_conflicts_over_threshold
  router.post('/fetch_conflicts_over_threshold', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { threshold, ...pagination } = ThresholdSchema.parse(req.body);
      const rows = await queries.fetchConflictsOverThreshold(threshold, pagination);
      page(res, rows, pagination);
    } catch (error) {
      next(error);
    }
  });

  // POST /students/fetch_students_by_affected_flag
  router.post('/fetch_students_by_affected_flag', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { is_affected, ...pagination } = AffectedFlagSchema.parse(req.body);
      const rows = await queries.fetchByAffectedFlag(is_affected, pagination);
      page(res, rows, pagination);
    } catch (error) {
      next(error);
    }
  });

  // POST /students/fetch_student_by_country_and_mental_health_threshold
  router.post(
    '/fetch_student_by_country_and_mental_health_threshold',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { country, mental_health_score, ...pagination } = CountryAndMentalHealthSchema.parse(req.body);
        const rows = await queries.fetchByCountryAndMentalHealth(country, mental_health_score, pagination);
        page(res, rows, pagination);
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
