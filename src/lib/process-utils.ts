/**
 * Process Utilities
 *
 * Subprocess execution with a hard timeout. Every outcome, including a missing
 * binary, is returned as a value so callers can degrade instead of crash.
 */

import { spawn, type ChildProcess } from 'child_process';
import { constants } from 'os';
import { toError } from './errors/DriverErrors.js';

export type ExitOutcome =
  | { kind: 'exited'; exitCode: number; stdout: string; stderr: string }
  | { kind: 'timed-out'; timeoutMs: number }
  | { kind: 'spawn-failed'; error: Error };

export interface RunOptions {
  timeoutMs: number;

  /** Attach the child to this terminal (installers and sudo prompts need it) */
  inheritStdio?: boolean;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: RunOptions
) => Promise<ExitOutcome>;

/**
 * Run a command, collecting stdout/stderr unless stdio is inherited.
 * The child is sent SIGTERM once the timeout elapses.
 */
export const runCommand: CommandRunner = (command, args, options) =>
  new Promise<ExitOutcome>((resolve) => {
    let child: ChildProcess;
    try {
      child = spawn(command, [...args], {
        stdio: options.inheritStdio ? 'inherit' : ['ignore', 'pipe', 'pipe']
      });
    } catch (error) {
      resolve({ kind: 'spawn-failed', error: toError(error) });
      return;
    }

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const settle = (outcome: ExitOutcome): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(outcome);
    };

    const timer = setTimeout(() => {
      child.kill('SIGTERM');
      settle({ kind: 'timed-out', timeoutMs: options.timeoutMs });
    }, options.timeoutMs);

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (error) => settle({ kind: 'spawn-failed', error }));
    child.on('close', (code, signal) => {
      settle({
        kind: 'exited',
        exitCode: code ?? signalExitCode(signal),
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8')
      });
    });
  });

/**
 * Shell convention: 128 + signal number
 */
function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  return 128 + constants.signals[signal];
}

/**
 * Runs a command with elevated operating-system rights.
 * Callers must obtain explicit consent before invoking runPrivileged.
 */
export interface PrivilegedRunner {
  /** The exact command line that runPrivileged would execute */
  describe(command: readonly string[]): string;

  runPrivileged(command: readonly string[], timeoutMs: number): Promise<ExitOutcome>;
}

/**
 * Prefixes an elevation command (sudo, doas, pkexec) and hands the terminal
 * to the child so password prompts and installer dialogs work.
 */
export class ElevatedRunner implements PrivilegedRunner {
  constructor(
    private readonly elevationCommand: string = 'sudo',
    private readonly run: CommandRunner = runCommand
  ) {}

  describe(command: readonly string[]): string {
    return [this.elevationCommand, ...command].join(' ');
  }

  runPrivileged(command: readonly string[], timeoutMs: number): Promise<ExitOutcome> {
    return this.run(this.elevationCommand, command, { timeoutMs, inheritStdio: true });
  }
}
