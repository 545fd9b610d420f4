/**
 * User-facing output channel.
 *
 * Services report through this instead of the console so they can be driven
 * by a recording sink in tests.
 */
export interface OutputSink {
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;

  /** Plain line without a symbol; empty string for a blank line */
  line(message?: string): void;

  /** Horizontal rule, e.g. "=" x 60 */
  rule(char?: string): void;

  /** Fraction in [0, 1] of a running transfer */
  progress(fraction: number): void;
}

/**
 * Interactive yes/no question. Resolves to the raw answer so callers decide
 * what counts as consent.
 */
export interface Confirmer {
  ask(question: string): Promise<string>;
}

/**
 * Only a literal "yes" (any case, surrounding whitespace ignored) is consent
 */
export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === 'yes';
}
