/**
 * Output formatting utilities for CLI
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import ora from 'ora';
import type { OutputSink } from '../../models/OutputSink.js';

/**
 * Symbols for terminal output
 */
const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ'
};

export const RULE_WIDTH = 60;

export interface OutputFormatterOptions {
  /** Force colours on or off (default: detected from the terminal) */
  color?: boolean;

  /** Raw writer for the in-place progress line */
  write?: (text: string) => void;
}

/**
 * Console implementation of OutputSink
 */
export class OutputFormatter implements OutputSink {
  private readonly chalk: ChalkInstance;
  private readonly write: (text: string) => void;
  private readonly spinnersEnabled: boolean | undefined;
  private progressOpen = false;
  private lastProgress: string | null = null;

  constructor(options: OutputFormatterOptions = {}) {
    this.chalk = options.color === undefined ? chalk : new Chalk({ level: options.color ? chalk.level || 1 : 0 });
    this.write = options.write ?? ((text) => process.stdout.write(text));
    this.spinnersEnabled = options.color === false ? false : undefined;
  }

  /**
   * Outputs success message
   */
  success(message: string): void {
    this.closeProgress();
    console.log(`${this.chalk.green(symbols.success)} ${message}`);
  }

  /**
   * Outputs error message
   */
  error(message: string): void {
    this.closeProgress();
    console.error(`${this.chalk.red(symbols.error)} ${this.chalk.red(message)}`);
  }

  /**
   * Outputs warning message
   */
  warning(message: string): void {
    this.closeProgress();
    console.warn(`${this.chalk.yellow(symbols.warning)} ${this.chalk.yellow(message)}`);
  }

  /**
   * Outputs info message
   */
  info(message: string): void {
    this.closeProgress();
    console.log(`${this.chalk.blue(symbols.info)} ${message}`);
  }

  line(message: string = ''): void {
    this.closeProgress();
    console.log(message);
  }

  rule(char: string = '='): void {
    this.closeProgress();
    console.log(char.repeat(RULE_WIDTH));
  }

  /**
   * Bold section title
   */
  heading(message: string): void {
    this.closeProgress();
    console.log(this.chalk.bold(message));
  }

  /**
   * Padded "label: value" row, e.g. for the GPU information block
   */
  field(label: string, value: string, width: number = 16): void {
    this.closeProgress();
    console.log(`  ${this.chalk.dim(`${label}:`.padEnd(width))}${value}`);
  }

  /**
   * Show a spinner while fn runs. ora falls back to no animation when stdout
   * is not a terminal.
   */
  async task<T>(message: string, fn: () => Promise<T>): Promise<T> {
    this.closeProgress();
    const spinner = ora({ text: message, color: 'cyan', isEnabled: this.spinnersEnabled }).start();
    try {
      return await fn();
    } finally {
      spinner.stop();
    }
  }

  /**
   * Rewrites a single line in place. Repeated values are skipped so an 8 KiB
   * chunk loop does not flood the terminal.
   */
  progress(fraction: number): void {
    const clamped = Math.min(Math.max(fraction, 0), 1);
    const text = `Progress: ${(clamped * 100).toFixed(1)}%`;
    if (text === this.lastProgress) {
      return;
    }

    this.lastProgress = text;
    this.progressOpen = true;
    this.write(`\r${this.chalk.cyan(text)}`);
  }

  /**
   * Ends an open progress line so the next message starts on its own line
   */
  private closeProgress(): void {
    if (this.progressOpen) {
      this.write('\n');
      this.progressOpen = false;
      this.lastProgress = null;
    }
  }
}
