import { createInterface, type Interface } from 'readline';
import { stdin, stdout } from 'process';
import chalk from 'chalk';
import type { Confirmer } from '../../models/OutputSink.js';

/**
 * Terminal confirmation prompt
 *
 * One readline interface serves every question, so answers piped in ahead of
 * time are consumed in order. Once input closes (end of pipe, Ctrl-D) every
 * further question answers with an empty string, which never counts as
 * consent.
 */
export class ReadlineConfirmer implements Confirmer {
  private rl: Interface | null = null;
  private readonly bufferedLines: string[] = [];
  private pending: ((answer: string) => void) | null = null;
  private inputClosed = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = stdin,
    private readonly output: NodeJS.WritableStream = stdout
  ) {}

  async ask(question: string): Promise<string> {
    const prompt = chalk.bold(question);

    if (this.inputClosed) {
      this.output.write(prompt);
    } else {
      const rl = this.open();
      rl.setPrompt(prompt);
      rl.prompt();
    }

    const buffered = this.bufferedLines.shift();
    if (buffered !== undefined) {
      return buffered;
    }
    if (this.inputClosed) {
      this.output.write('\n');
      return '';
    }

    return new Promise<string>((resolve) => {
      this.pending = resolve;
    });
  }

  /**
   * Release the terminal; call when the command is done asking
   */
  close(): void {
    this.rl?.close();
  }

  private open(): Interface {
    if (this.rl) {
      return this.rl;
    }

    const rl = createInterface({ input: this.input, output: this.output });

    rl.on('line', (line) => {
      const resolve = this.pending;
      if (resolve) {
        this.pending = null;
        resolve(line);
      } else {
        this.bufferedLines.push(line);
      }
    });

    rl.on('close', () => {
      this.inputClosed = true;
      const resolve = this.pending;
      this.pending = null;
      resolve?.('');
    });

    this.rl = rl;
    return rl;
  }
}
