/**
 * Prompt Relay
 *
 * Interactive loop: choose a template, obtain a prompt from a file or the
 * keyboard, run it through the chat model, parse the reply and dispatch the
 * HTTP request it describes. A failure in any step is logged and the loop
 * starts over; choosing `exit` as the template ends it.
 */

import { AppError, toError } from '../errors.js';
import type { Logger } from '../logger.js';
import { runPrompt, type ChatModel, type TextSink } from './chat-model.js';
import type { DispatchResult, HttpDispatcher } from './dispatcher.js';
import { parseModelOutput, type DispatchRequest } from './model-output.js';
import type { PromptFileReader } from './prompt-source.js';
import type { TemplateStore } from './template.js';

export type RelayState =
  | 'SELECT_TEMPLATE'
  | 'SELECT_PROMPT_SOURCE'
  | 'READ_FILE'
  | 'READ_INTERACTIVE'
  | 'BUILD_PROMPT'
  | 'SEND_TO_MODEL'
  | 'PARSE_RESPONSE'
  | 'DISPATCH_HTTP'
  | 'DONE';

export const EXIT_OPTION = 'exit';
export const FILE_OPTION = 'file';

/** Thrown by a prompter whose input has ended; stops the relay. */
export class PrompterClosedError extends Error {
  constructor() {
    super('Prompt input closed');
    this.name = 'PrompterClosedError';
  }
}

export interface Prompter {
  /** `options[0]` is a caption and cannot be chosen. */
  select(options: readonly string[]): Promise<string>;
  input(question: string): Promise<string>;
}

export interface RelayDependencies {
  prompter: Prompter;
  templates: TemplateStore;
  promptFiles: PromptFileReader;
  model: ChatModel;
  dispatcher: HttpDispatcher;
  output: TextSink;
  logger: Logger;
}

export interface RelayOptions {
  templateOptions: readonly string[];
  promptOptions: readonly string[];
  modelTimeoutMs: number;
}

export interface RelaySummary {
  dispatched: number;
  /** Result of the most recent dispatch. */
  last?: DispatchResult;
}

interface Cycle {
  template?: string;
  source?: string;
  prompt?: string;
  finalPrompt?: string;
  reply?: string;
  request?: DispatchRequest;
}

export class PromptRelay {
  private state: RelayState = 'SELECT_TEMPLATE';
  private cycle: Cycle = {};
  private dispatched = 0;
  private lastResult?: DispatchResult;

  constructor(
    private readonly deps: RelayDependencies,
    private readonly options: RelayOptions
  ) {}

  get currentState(): RelayState {
    return this.state;
  }

  /** Runs until `exit` is chosen or `signal` aborts. */
  async run(signal?: AbortSignal): Promise<RelaySummary> {
    while (this.state !== 'DONE') {
      if (signal?.aborted) {
        this.state = 'DONE';
        break;
      }
      try {
        this.state = await this.step(signal);
      } catch (error) {
        if (error instanceof PrompterClosedError) {
          this.state = 'DONE';
          break;
        }
        this.logFailure(error);
        this.restart();
      }
    }
    return { dispatched: this.dispatched, last: this.lastResult };
  }

  async step(signal?: AbortSignal): Promise<RelayState> {
    const { prompter, templates, promptFiles, model, dispatcher, output, logger } = this.deps;
    const cycle = this.cycle;

    switch (this.state) {
      case 'SELECT_TEMPLATE': {
        const template = await prompter.select(this.options.templateOptions);
        if (template === EXIT_OPTION) {
          return 'DONE';
        }
        cycle.template = template;
        return 'SELECT_PROMPT_SOURCE';
      }

      case 'SELECT_PROMPT_SOURCE':
        cycle.source = await prompter.select(this.options.promptOptions);
        return cycle.source === FILE_OPTION ? 'READ_FILE' : 'READ_INTERACTIVE';

      case 'READ_FILE': {
        const name = await prompter.input('Enter the file name without file ending (e.g. example):');
        cycle.prompt = await promptFiles.read(name);
        return 'BUILD_PROMPT';
      }

      case 'READ_INTERACTIVE':
        cycle.prompt = await prompter.input('Enter your prompt:');
        return 'BUILD_PROMPT';

      case 'BUILD_PROMPT':
        cycle.finalPrompt = await templates.buildFinalPrompt(
          required(cycle.prompt, 'prompt'),
          required(cycle.template, 'template')
        );
        return 'SEND_TO_MODEL';

      case 'SEND_TO_MODEL':
        cycle.reply = await runPrompt(model, required(cycle.finalPrompt, 'final prompt'), output, logger, {
          timeoutMs: this.options.modelTimeoutMs,
          signal,
        });
        output.write('\n');
        return 'PARSE_RESPONSE';

      case 'PARSE_RESPONSE':
        cycle.request = parseModelOutput(required(cycle.reply, 'reply'));
        return 'DISPATCH_HTTP';

      case 'DISPATCH_HTTP': {
        const result = await dispatcher.dispatch(required(cycle.request, 'request'), signal);
        this.dispatched += 1;
        this.lastResult = result;
        output.write(`\nResponse.status_code: ${result.status}\n\n`);
        this.cycle = {};
        return 'SELECT_TEMPLATE';
      }

      case 'DONE':
        return 'DONE';
    }
  }

  private restart(): void {
    this.cycle = {};
    this.state = 'SELECT_TEMPLATE';
  }

  private logFailure(error: unknown): void {
    const failure = toError(error);
    this.deps.logger.error('Relay cycle failed', {
      state: this.state,
      code: failure instanceof AppError ? failure.code : undefined,
      error: failure,
    });
  }
}

function required<T>(value: T | undefined, name: string): T {
  if (value === undefined) {
    throw new Error(`Relay reached a step without a ${name}`);
  }
  return value;
}
