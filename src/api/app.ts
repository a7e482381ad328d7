/**
 * Express Application Factory
 *
 * Builds the configured app from already-constructed services so that the
 * server entry point and the route tests share one wiring.
 */

import express, { type Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import type { StudentImporter } from '../etl/student-importer.js';
import type { Logger } from '../logger.js';
import type { ChatModel } from '../relay/chat-model.js';
import type { TemplateStore } from '../relay/template.js';
import type { Database } from './db/pool.js';
import { createErrorHandler, notFoundHandler } from './middleware/error.js';
import type { StudentQueryService } from './queries/student-queries.js';
import { createPromptRouter } from './routes/prompt.js';
import { createStudentsRouter } from './routes/students.js';
import { swaggerSpec } from './swagger.js';

export interface AppConfig {
  /** Enable CORS (default: true) */
  cors?: boolean;
  /** Enable Helmet security (default: true) */
  helmet?: boolean;
  /** Disable CSP and HSTS for local development (default: true outside production) */
  relaxedSecurity?: boolean;
  /** JSON body limit (default: '1mb') */
  jsonLimit?: string;
  /** Include internal error messages in failure responses */
  exposeErrors?: boolean;
}

export interface AppDependencies {
  db: Database;
  importer: StudentImporter;
  queries: StudentQueryService;
  templates: TemplateStore;
  model: ChatModel;
  csvPath: string;
  modelTimeoutMs: number;
  logger: Logger;
}

const defaultConfig: Required<AppConfig> = {
  cors: true,
  helmet: true,
  relaxedSecurity: process.env.NODE_ENV !== 'production',
  jsonLimit: '1mb',
  exposeErrors: process.env.NODE_ENV === 'development',
};

/**
 * Create a configured Express application
 */
export function createApp(deps: AppDependencies, config: AppConfig = {}): Application {
  const app = express();
  const mergedConfig = { ...defaultConfig, ...config };
  const { db, logger } = deps;

  // Security middleware
  if (mergedConfig.helmet) {
    app.use(
      helmet({
        contentSecurityPolicy: mergedConfig.relaxedSecurity ? false : undefined,
        hsts: mergedConfig.relaxedSecurity ? false : undefined,
      })
    );
  }

  // CORS
  if (mergedConfig.cors) {
    app.use(cors());
  }

  // Body parsing
  app.use(express.json({ limit: mergedConfig.jsonLimit }));

  // Swagger documentation
  app.get('/api/spec', (_req, res) => res.json(swaggerSpec));
  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));

  app.get('/', (_req, res) => {
    res.json({ status: 'success', message: 'Student survey API is running' });
  });

  // Health check
  app.get('/health', async (_req, res) => {
    if (await db.ping()) {
      res.json({ status: 'healthy', timestamp: new Date().toISOString() });
    } else {
      res.status(503).json({ status: 'unhealthy', error: 'Database connection failed' });
    }
  });

  app.use(
    '/students',
    createStudentsRouter({
      importer: deps.importer,
      queries: deps.queries,
      csvPath: deps.csvPath,
      logger: logger.child({ router: 'students' }),
    })
  );
  app.use(
    '/prompt',
    createPromptRouter({
      templates: deps.templates,
      model: deps.model,
      timeoutMs: deps.modelTimeoutMs,
      logger: logger.child({ router: 'prompt' }),
    })
  );

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger, mergedConfig.exposeErrors));

  return app;
}

/**
 * Start the Express server
 */
export function startServer(app: Application, port: number, logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    app.listen(port, () => {
      logger.info(`Student survey API running at http://localhost:${port}`);
      logger.info(`Swagger docs at http://localhost:${port}/api/docs`);
      resolve();
    });
  });
}
