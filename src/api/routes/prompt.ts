import { Router, type NextFunction, type Request, type Response } from 'express';
import { toError } from '../../errors.js';
import type { Logger } from '../../logger.js';
import { runPrompt, type ChatModel } from '../../relay/chat-model.js';
import type { TemplateStore } from '../../relay/template.js';
import { PromptRequestSchema } from '../schemas/students.js';

export interface PromptRouterDependencies {
  templates: TemplateStore;
  model: ChatModel;
  timeoutMs: number;
  logger: Logger;
}

export function createPromptRouter(deps: PromptRouterDependencies): Router {
  const { templates, model, timeoutMs, logger } = deps;
  const router = Router();

  // POST /prompt - streams the model reply as plain text
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    let finalPrompt: string;
    try {
      const { prompt, template_name } = PromptRequestSchema.parse(req.body);
      logger.debug('/prompt endpoint called', { template_name });
      finalPrompt = await templates.buildFinalPrompt(prompt, template_name);
    } catch (error) {
      next(error);
      return;
    }

    // cancel the model call if the client goes away mid-stream
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    res.status(200).type('text/plain; charset=utf-8');
    try {
      await runPrompt(model, finalPrompt, res, logger, { timeoutMs, signal: controller.signal });
      logger.debug('Prompt execution finished');
    } catch (error) {
      if (controller.signal.aborted && res.destroyed) {
        logger.info('Client disconnected, model call cancelled');
      } else {
        logger.error('Prompt execution failed', { error: toError(error) });
        res.write('\n[model call failed]\n');
      }
    } finally {
      res.end();
    }
  });

  return router;
}
