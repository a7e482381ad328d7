import { readFile } from 'fs/promises';
import path from 'path';
import { PromptFileNotFoundError } from '../errors.js';
import type { Logger } from '../logger.js';
import { isMissingFile } from './template.js';

/**
 * Reads prompts stored as `<directory>/<name>.txt`.
 */
export class PromptFileReader {
  constructor(
    private readonly directory: string,
    private readonly logger: Logger
  ) {}

  async read(name: string): Promise<string> {
    const fileName = `${path.basename(name.trim())}.txt`;
    try {
      return await readFile(path.join(this.directory, fileName), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        const notFound = new PromptFileNotFoundError(fileName, this.directory);
        this.logger.error('Error when fetching file containing prompt', { error: notFound });
        throw notFound;
      }
      throw error;
    }
  }
}
