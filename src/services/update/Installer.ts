import { ok, err, type Result } from 'neverthrow';
import type { Confirmer, OutputSink } from '../../models/OutputSink.js';
import { isAffirmative } from '../../models/OutputSink.js';
import type { InstallOutcome, InstallState } from '../../models/UpdateCheckResult.js';
import {
  InstallFailedError,
  InstallLaunchError,
  InstallTimedOutError,
  type InstallError
} from '../../lib/errors/DriverErrors.js';
import type { PrivilegedRunner } from '../../lib/process-utils.js';
import { silentLogger, type StructuredLogger } from '../../cli/utils/logger.js';
import { INSTALL_TIMEOUT_MS } from '../../constants/driver-constants.js';

export interface InstallerOptions {
  output: OutputSink;
  confirmer: Confirmer;
  runner: PrivilegedRunner;
  timeoutMs?: number;
  logger?: StructuredLogger;
}

/**
 * Installer - runs a downloaded driver .run file with elevated rights
 *
 * Lifecycle per call:
 *   awaiting-confirmation -> cancelled
 *   awaiting-confirmation -> running -> succeeded | failed | timed-out
 *
 * A decline is an ok() outcome, not an error. Nothing here throws.
 */
export class Installer {
  private readonly output: OutputSink;
  private readonly confirmer: Confirmer;
  private readonly runner: PrivilegedRunner;
  private readonly timeoutMs: number;
  private readonly logger: StructuredLogger;
  private currentState: InstallState | null = null;

  constructor(options: InstallerOptions) {
    this.output = options.output;
    this.confirmer = options.confirmer;
    this.runner = options.runner;
    this.timeoutMs = options.timeoutMs ?? INSTALL_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * State of the most recent install() call, null before the first one
   */
  get state(): InstallState | null {
    return this.currentState;
  }

  async install(artifactPath: string): Promise<Result<InstallOutcome, InstallError>> {
    const command = [artifactPath];
    this.transition('awaiting-confirmation', { artifactPath });

    this.output.line();
    this.output.warning('Driver installation requires root privileges');
    this.output.line(`The installer will run: ${this.runner.describe(command)}`);
    this.output.line();

    const answer = await this.confirmer.ask('Proceed with installation? (yes/no): ');
    if (!isAffirmative(answer)) {
      this.transition('cancelled');
      this.output.line('Installation cancelled.');
      return ok({ status: 'declined' });
    }

    this.transition('running');
    this.output.line();
    this.output.info('Starting driver installation...');
    this.output.line('Note: This will likely require X server to be stopped.');
    this.output.line();

    const outcome = await this.runner.runPrivileged(command, this.timeoutMs);

    switch (outcome.kind) {
      case 'exited':
        if (outcome.exitCode === 0) {
          this.transition('succeeded');
          this.output.line();
          this.output.success('Driver installation completed successfully!');
          this.output.warning('You may need to reboot your system for changes to take effect.');
          return ok({ status: 'succeeded' });
        }
        return this.failWith('failed', new InstallFailedError(artifactPath, outcome.exitCode));

      case 'timed-out':
        return this.failWith('timed-out', new InstallTimedOutError(artifactPath, outcome.timeoutMs));

      case 'spawn-failed':
        return this.failWith('failed', new InstallLaunchError(artifactPath, outcome.error));
    }
  }

  private failWith(state: 'failed' | 'timed-out', error: InstallError): Result<never, InstallError> {
    this.transition(state, { code: error.code });
    this.output.error(error.message);
    this.logger.error('Driver installation did not succeed', error, { artifactPath: error.artifactPath });
    return err(error);
  }

  private transition(state: InstallState, context?: Record<string, unknown>): void {
    this.logger.debug('Installer state change', { from: this.currentState, to: state, ...context });
    this.currentState = state;
  }
}
