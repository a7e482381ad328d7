/**
 * Chat Model
 *
 * The model is an external collaborator that turns a prompt into a stream of
 * text fragments. `runPrompt` consumes that stream, echoing each fragment to a
 * sink as it arrives and returning the whole reply.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { Logger } from '../logger.js';

export interface ChatModel {
  stream(prompt: string, signal: AbortSignal): AsyncIterable<string>;
}

export interface TextSink {
  write(chunk: string): unknown;
}

export interface ChatModelOptions {
  /** Base URL of an Anthropic-compatible messages API, local or hosted */
  baseURL: string;
  apiKey: string;
  model: string;
  maxTokens: number;
}

export class AnthropicChatModel implements ChatModel {
  private readonly client: Anthropic;

  constructor(private readonly options: ChatModelOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey, baseURL: options.baseURL });
  }

  async *stream(prompt: string, signal: AbortSignal): AsyncIterable<string> {
    const stream = this.client.messages.stream(
      {
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        messages: [{ role: 'user', content: prompt }],
      },
      { signal }
    );

    for await (const event of stream) {
      if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
        yield event.delta.text;
      }
    }
  }
}

export class ModelTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Model did not finish within ${timeoutMs}ms`);
    this.name = 'ModelTimeoutError';
  }
}

export interface RunPromptOptions {
  timeoutMs: number;
  /** Cancels the call, e.g. when an HTTP client disconnects */
  signal?: AbortSignal;
}

export async function runPrompt(
  model: ChatModel,
  prompt: string,
  sink: TextSink,
  logger: Logger,
  options: RunPromptOptions
): Promise<string> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new ModelTimeoutError(options.timeoutMs)), options.timeoutMs);
  const onCallerAbort = (): void => controller.abort(options.signal?.reason);

  if (options.signal?.aborted) {
    controller.abort(options.signal.reason);
  } else {
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
  }

  logger.debug('Running prompt', { characters: prompt.length });
  const chunks: string[] = [];
  try {
    for await (const chunk of model.stream(prompt, controller.signal)) {
      if (controller.signal.aborted) {
        break;
      }
      chunks.push(chunk);
      sink.write(chunk);
    }
  } catch (error) {
    // an aborted stream rethrows the abort reason below
    if (!controller.signal.aborted) {
      throw error;
    }
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onCallerAbort);
  }

  if (controller.signal.aborted) {
    throw controller.signal.reason;
  }
  return chunks.join('');
}
