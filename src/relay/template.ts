/**
 * Prompt Templates
 *
 * Templates are plain text files with `$name` / `${name}` placeholders.
 * Substitution is lenient: `$$` becomes `$`, and placeholders without a value
 * stay in the output exactly as written.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { TemplateNotFoundError } from '../errors.js';
import type { Logger } from '../logger.js';

const PLACEHOLDER = /\$(?:(\$)|([_a-z][_a-z0-9]*)|\{([_a-z][_a-z0-9]*)\})/gi;

export function substitute(template: string, values: Record<string, string>): string {
  return template.replace(
    PLACEHOLDER,
    (match: string, escaped?: string, named?: string, braced?: string): string => {
      if (escaped !== undefined) {
        return '$';
      }
      const name = named ?? braced;
      if (name !== undefined && Object.hasOwn(values, name)) {
        return values[name];
      }
      return match;
    }
  );
}

export function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  );
}

export class TemplateStore {
  constructor(
    private readonly directory: string,
    private readonly logger: Logger
  ) {}

  async load(templateName: string): Promise<string> {
    const filePath = path.join(this.directory, `${path.basename(templateName)}.txt`);
    try {
      return await readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        const notFound = new TemplateNotFoundError(templateName, this.directory);
        this.logger.error('Error when building final prompt template', { error: notFound });
        throw notFound;
      }
      throw error;
    }
  }

  /** Loads `templateName` and injects `prompt` into its `prompt` placeholder. */
  async buildFinalPrompt(prompt: string, templateName: string): Promise<string> {
    const template = await this.load(templateName);
    const finalPrompt = substitute(template, { prompt });
    this.logger.debug('Fetched prompt template and injected the prompt', { templateName });
    return finalPrompt;
  }
}
