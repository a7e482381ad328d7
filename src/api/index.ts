import 'dotenv/config';
import { loadConfig } from '../config.js';
import { DimensionResolver } from '../etl/dimension-resolver.js';
import { FactLoader } from '../etl/fact-loader.js';
import { StudentImporter } from '../etl/student-importer.js';
import { createLogger } from '../logger.js';
import { AnthropicChatModel } from '../relay/chat-model.js';
import { TemplateStore } from '../relay/template.js';
import { createApp, startServer } from './app.js';
import { createDatabase, createPool } from './db/pool.js';
import { ensureSchema, verifySchema } from './db/schema.js';
import { StudentQueryService } from './queries/student-queries.js';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel, context: { service: 'api' } });

async function main(): Promise<void> {
  const db = createDatabase(createPool({ connectionString: config.databaseUrl }, logger), logger);

  // a broken schema stops startup
  await ensureSchema(db, logger);
  await verifySchema(db, logger);

  const etlLogger = logger.child({ component: 'etl' });
  const importer = new StudentImporter(
    new DimensionResolver(db, etlLogger),
    new FactLoader(db, etlLogger),
    etlLogger
  );

  if (config.importOnStartup) {
    const summary = await importer.importFile(config.studentsCsvPath);
    logger.info('Imported survey on startup', { ...summary });
  }

  const app = createApp(
    {
      db,
      importer,
      queries: new StudentQueryService(db, logger.child({ component: 'queries' })),
      templates: new TemplateStore(config.relay.templatesDir, logger),
      model: new AnthropicChatModel({
        baseURL: config.llm.url,
        apiKey: config.llm.apiKey,
        model: config.llm.model,
        maxTokens: config.llm.maxTokens,
      }),
      csvPath: config.studentsCsvPath,
      modelTimeoutMs: config.llm.timeoutMs,
      logger,
    },
    { exposeErrors: config.env === 'development' }
  );

  await startServer(app, config.port, logger);
}

main().catch((error: unknown) => {
  logger.error('Startup failed', { error });
  process.exit(1);
});
