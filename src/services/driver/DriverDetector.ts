import { ok, err, type Result } from 'neverthrow';
import type { DriverState, GPUInfo, VersionIdentifier } from '../../models/DriverState.js';
import { DetectionUnavailableError } from '../../lib/errors/DriverErrors.js';
import { runCommand, type CommandRunner, type ExitOutcome } from '../../lib/process-utils.js';
import { silentLogger, type StructuredLogger } from '../../cli/utils/logger.js';
import { DEFAULT_SMI_COMMAND, DETECTION_TIMEOUT_MS } from '../../constants/driver-constants.js';

export interface DriverDetectorOptions {
  smiCommand?: string;
  timeoutMs?: number;
  run?: CommandRunner;
  logger?: StructuredLogger;
}

/**
 * DriverDetector service - Reads NVIDIA driver state from nvidia-smi
 *
 * Every query is a separate, time-bounded invocation. A missing binary, a
 * timeout or a nonzero exit means "not installed" for the availability check
 * and "field unavailable" for the individual queries; neither aborts the rest
 * of the report.
 */
export class DriverDetector {
  private readonly smiCommand: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;
  private readonly logger: StructuredLogger;

  constructor(options: DriverDetectorOptions = {}) {
    this.smiCommand = options.smiCommand ?? DEFAULT_SMI_COMMAND;
    this.timeoutMs = options.timeoutMs ?? DETECTION_TIMEOUT_MS;
    this.run = options.run ?? runCommand;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Probe `nvidia-smi --version`
   *
   * @returns The version banner, or why detection is unavailable
   */
  async checkAvailability(): Promise<Result<string, DetectionUnavailableError>> {
    const outcome = await this.run(this.smiCommand, ['--version'], { timeoutMs: this.timeoutMs });

    if (outcome.kind === 'exited' && outcome.exitCode === 0) {
      return ok(outcome.stdout.trim());
    }

    const error = new DetectionUnavailableError(this.smiCommand, this.describeFailure(outcome));
    this.logger.warn('Driver detection unavailable', { command: this.smiCommand, error: error.message });
    return err(error);
  }

  async isDriverAvailable(): Promise<boolean> {
    const availability = await this.checkAvailability();
    return availability.isOk();
  }

  async getDriverVersion(): Promise<VersionIdentifier | null> {
    return this.query('driver_version');
  }

  /**
   * Name, CUDA version and memory usage. Fields whose query fails are left out.
   */
  async getGpuInfo(): Promise<GPUInfo> {
    const info: GPUInfo = {};

    const gpuName = await this.query('name');
    if (gpuName) {
      info.gpuName = gpuName;
    }

    const cudaVersion = await this.query('cuda_version');
    if (cudaVersion) {
      info.cudaVersion = cudaVersion;
    }

    const memory = await this.query('memory.total,memory.used,memory.free');
    if (memory) {
      const parts = memory.split(', ');
      if (parts.length === 3) {
        const [total, used, free] = parts;
        info.memoryTotal = total;
        info.memoryUsed = used;
        info.memoryFree = free;
      }
    }

    return info;
  }

  /**
   * Full driver state, or null when no driver is detected
   */
  async detect(): Promise<DriverState | null> {
    if (!(await this.isDriverAvailable())) {
      return null;
    }

    const version = await this.getDriverVersion();
    if (!version) {
      return null;
    }

    const gpu = await this.getGpuInfo();
    return { version, ...gpu };
  }

  /**
   * Run `--query-gpu=<fields> --format=csv,noheader` and return the first
   * non-empty line (multi-GPU hosts report one line per device)
   */
  private async query(fields: string): Promise<string | null> {
    const outcome = await this.run(
      this.smiCommand,
      [`--query-gpu=${fields}`, '--format=csv,noheader'],
      { timeoutMs: this.timeoutMs }
    );

    if (outcome.kind !== 'exited' || outcome.exitCode !== 0) {
      this.logger.debug('nvidia-smi query failed', { fields, failure: this.describeFailure(outcome) });
      return null;
    }

    const line = outcome.stdout
      .split('\n')
      .map(entry => entry.trim())
      .find(entry => entry.length > 0);

    return line ?? null;
  }

  private describeFailure(outcome: ExitOutcome): string {
    switch (outcome.kind) {
      case 'exited':
        return `exited with code ${outcome.exitCode}`;
      case 'timed-out':
        return `timed out after ${outcome.timeoutMs}ms`;
      case 'spawn-failed':
        return outcome.error.message;
    }
  }
}
