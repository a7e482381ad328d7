import { createInterface, type Interface } from 'readline/promises';
import { PrompterClosedError, type Prompter } from './prompt-relay.js';

/**
 * Numbered-menu prompter on stdin/stdout.
 */
export class TerminalPrompter implements Prompter {
  private readonly rl: Interface;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
    this.rl.on('close', () => {
      this.closed = true;
    });
  }

  async select(options: readonly string[]): Promise<string> {
    const [caption, ...choices] = options;
    if (choices.length === 0) {
      throw new Error(`Menu "${caption ?? ''}" has no options`);
    }

    for (;;) {
      this.output.write(`${caption}\n`);
      choices.forEach((choice, index) => this.output.write(`  ${index + 1}) ${choice}\n`));
      const answer = (await this.ask(`Select [1-${choices.length}]: `)).trim();

      const byNumber = Number.parseInt(answer, 10);
      if (String(byNumber) === answer && byNumber >= 1 && byNumber <= choices.length) {
        return choices[byNumber - 1];
      }
      const byName = choices.find((choice) => choice.toLowerCase() === answer.toLowerCase());
      if (byName !== undefined) {
        return byName;
      }
      this.output.write(`"${answer}" is not an option\n`);
    }
  }

  input(question: string): Promise<string> {
    return this.ask(`${question}\n`);
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }

  private async ask(question: string): Promise<string> {
    if (this.closed) {
      throw new PrompterClosedError();
    }
    try {
      return await this.rl.question(question);
    } catch (error) {
      if (this.closed) {
        throw new PrompterClosedError();
      }
      throw error;
    }
  }
}
