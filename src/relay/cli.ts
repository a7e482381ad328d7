#!/usr/bin/env node
/**
 * Prompt Relay CLI
 *
 *   npm run relay
 */

import 'dotenv/config';
import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { AnthropicChatModel } from './chat-model.js';
import { HttpDispatcher } from './dispatcher.js';
import { PromptRelay } from './prompt-relay.js';
import { PromptFileReader } from './prompt-source.js';
import { TemplateStore } from './template.js';
import { TerminalPrompter } from './terminal-prompter.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, context: { service: 'relay' } });
  const prompter = new TerminalPrompter();

  const relay = new PromptRelay(
    {
      prompter,
      templates: new TemplateStore(config.relay.templatesDir, logger),
      promptFiles: new PromptFileReader(config.relay.promptsDir, logger),
      model: new AnthropicChatModel({
        baseURL: config.llm.url,
        apiKey: config.llm.apiKey,
        model: config.llm.model,
        maxTokens: config.llm.maxTokens,
      }),
      dispatcher: new HttpDispatcher(config.relay.allowedHosts, logger),
      output: process.stdout,
      logger,
    },
    {
      templateOptions: config.relay.templates,
      promptOptions: config.relay.promptOptions,
      modelTimeoutMs: config.llm.timeoutMs,
    }
  );

  const controller = new AbortController();
  process.once('SIGINT', () => {
    controller.abort();
    prompter.close();
  });

  const summary = await relay.run(controller.signal);
  prompter.close();
  logger.info('Relay finished', { dispatched: summary.dispatched });
}

main().catch((error: unknown) => {
  console.error('Prompt relay failed:', error);
  process.exit(1);
});
