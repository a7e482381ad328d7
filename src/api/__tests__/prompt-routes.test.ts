import path from 'path';
import { fileURLToPath } from 'url';
import express, { type Express } from 'express';
import request from 'supertest';
import { describe, it, expect } from 'vitest';
import type { ChatModel } from '../../relay/chat-model.js';
import { TemplateStore } from '../../relay/template.js';
import { fakeChatModel, silentLogger } from '../../__tests__/helpers.js';
import { createErrorHandler } from '../middleware/error.js';
import { createPromptRouter } from '../routes/prompt.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const TEMPLATES_DIR = path.resolve(__dirname, '..', '..', '..', 'templates');

function buildApp(model: ChatModel): Express {
  const logger = silentLogger();
  const app = express();
  app.use(express.json());
  app.use(
    '/prompt',
    createPromptRouter({ templates: new TemplateStore(TEMPLATES_DIR, logger), model, timeoutMs: 1000, logger })
  );
  app.use(createErrorHandler(logger, false));
  return app;
}

describe('POST /prompt', () => {
  it('streams the model reply as plain text', async () => {
    const { model, prompts } = fakeChatModel(['{"url": ', '"http://localhost:3001"}']);

    const response = await request(buildApp(model))
      .post('/prompt')
      .send({ prompt: 'Which students are from Spain?', template_name: 'example' })
      .expect(200);

    expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(response.text).toBe('{"url": "http://localhost:3001"}');
    expect(prompts).toHaveLength(1);
    expect(prompts[0].endsWith('Request:\nWhich students are from Spain?\n')).toBe(true);
  });

  it('fills $prompt placeholders too', async () => {
    const { model, prompts } = fakeChatModel(['done']);

    await request(buildApp(model))
      .post('/prompt')
      .send({ prompt: 'const x = 1;', template_name: 'generate_docstring' })
      .expect(200);

    expect(prompts[0]).toContain('\n\nconst x = 1;\n');
    expect(prompts[0]).not.toContain('$prompt');
  });

  it('answers 400 for an unknown template', async () => {
    const { model, prompts } = fakeChatModel(['unused']);

    const response = await request(buildApp(model))
      .post('/prompt')
      .send({ prompt: 'hello', template_name: 'missing' })
      .expect(400);

    expect(response.body.error.code).toBe('TEMPLATE_NOT_FOUND');
    expect(prompts).toEqual([]);
  });

  it('rejects template names that are not plain file names', async () => {
    const { model } = fakeChatModel([]);

    const response = await request(buildApp(model))
      .post('/prompt')
      .send({ prompt: 'hello', template_name: '../secrets' })
      .expect(400);

    expect(response.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('ends the stream with a marker when the model fails', async () => {
    const model: ChatModel = {
      async *stream(): AsyncIterable<string> {
        yield 'partial';
        throw new Error('model crashed');
      },
    };

    const response = await request(buildApp(model))
      .post('/prompt')
      .send({ prompt: 'hello', template_name: 'example' })
      .expect(200);

    expect(response.text).toBe('partial\n[model call failed]\n');
  });
});
