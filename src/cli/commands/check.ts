/**
 * Check Command
 *
 * Reports the installed NVIDIA driver and GPU, then checks for a newer driver
 * unless --skip-update-check is given. Without a driver it offers a fresh
 * install.
 */

import { Command } from 'commander';
import { hasMemoryInfo } from '../../models/DriverState.js';
import type { Confirmer, OutputSink } from '../../models/OutputSink.js';
import { loadConfig, loadEnvFile, type DriverCheckConfig } from '../../lib/env-config.js';
import { ElevatedRunner } from '../../lib/process-utils.js';
import { DriverDetector } from '../../services/driver/DriverDetector.js';
import { RemoteVersionResolver } from '../../services/update/RemoteVersionResolver.js';
import { Downloader } from '../../services/update/Downloader.js';
import { Installer } from '../../services/update/Installer.js';
import { UpdateOrchestrator } from '../../services/update/UpdateOrchestrator.js';
import { Logger, type StructuredLogger } from '../utils/logger.js';
import { OutputFormatter } from '../utils/output.js';
import { ReadlineConfirmer } from '../utils/prompt.js';
import { NVIDIA_MANUAL_DOWNLOAD_URL } from '../../constants/driver-constants.js';

type CheckOptions = {
  skipUpdateCheck?: boolean;
  verbose?: boolean;
};

export type ReportSink = OutputSink & Pick<OutputFormatter, 'field' | 'heading' | 'task'>;

export interface CheckDependencies {
  detector: Pick<DriverDetector, 'isDriverAvailable' | 'getDriverVersion' | 'getGpuInfo'>;
  orchestrator: Pick<UpdateOrchestrator, 'installFresh' | 'checkForUpdates'>;
  output: ReportSink;
  logger: StructuredLogger;
  manualDownloadUrl?: string;
}

/**
 * Run the full driver check
 *
 * @returns Process exit code: 1 only when no driver is present and the fresh
 *   install did not succeed
 */
export async function runCheck(deps: CheckDependencies, skipUpdateCheck: boolean = false): Promise<number> {
  const { detector, orchestrator, output, logger } = deps;
  const manualUrl = deps.manualDownloadUrl ?? NVIDIA_MANUAL_DOWNLOAD_URL;

  output.rule();
  output.heading('NVIDIA Driver Check');
  output.rule();
  output.line();

  const driverAvailable = await output.task('Detecting NVIDIA driver...', () => detector.isDriverAvailable());
  if (!driverAvailable) {
    output.error('NVIDIA driver not found or nvidia-smi not available');
    output.line();
    output.line('Would you like to install the latest NVIDIA driver?');

    const installed = await orchestrator.installFresh();
    logger.info('Fresh install finished', { installed });

    if (installed) {
      output.line();
      output.success('Installation process completed!');
      output.warning('Please reboot your system and run this tool again to verify.');
      return 0;
    }

    output.line();
    output.line('For manual installation, visit:');
    output.line(manualUrl);
    return 1;
  }

  output.success('NVIDIA driver is installed');
  output.line();

  const driverVersion = await detector.getDriverVersion();
  if (driverVersion) {
    output.line(`Driver Version: ${driverVersion}`);
  }

  const gpu = await detector.getGpuInfo();
  if (Object.keys(gpu).length > 0) {
    output.line();
    output.heading('GPU Information:');
    output.rule('-');
    if (gpu.gpuName) {
      output.field('GPU Name', gpu.gpuName);
    }
    if (gpu.cudaVersion) {
      output.field('CUDA Version', gpu.cudaVersion);
    }
    if (hasMemoryInfo(gpu)) {
      output.field('Memory Total', gpu.memoryTotal);
      output.field('Memory Used', gpu.memoryUsed);
      output.field('Memory Free', gpu.memoryFree);
    }
  }

  if (!skipUpdateCheck) {
    if (driverVersion) {
      const result = await orchestrator.checkForUpdates(driverVersion);
      logger.info('Update check finished', { ...result });
    } else {
      output.line();
      output.warning('Cannot check for updates - current driver version unknown');
    }
  }

  output.line();
  output.rule();
  return 0;
}

/**
 * Wire the real services from configuration
 */
export function createCheckDependencies(
  config: DriverCheckConfig,
  output: OutputFormatter,
  logger: StructuredLogger,
  confirmer: Confirmer
): CheckDependencies {
  const detector = new DriverDetector({
    smiCommand: config.smiCommand,
    timeoutMs: config.timeouts.detectionMs,
    logger
  });

  const resolver = new RemoteVersionResolver({
    indexUrl: config.latestVersionUrl,
    userAgent: config.userAgent,
    timeoutMs: config.timeouts.versionResolutionMs,
    logger
  });

  const downloader = new Downloader({
    output,
    userAgent: config.userAgent,
    timeoutMs: config.timeouts.downloadMs,
    logger
  });

  const installer = new Installer({
    output,
    confirmer,
    runner: new ElevatedRunner(config.elevationCommand),
    timeoutMs: config.timeouts.installMs,
    logger
  });

  const orchestrator = new UpdateOrchestrator({
    resolver,
    downloader,
    installer,
    output,
    confirmer,
    downloadBaseUrl: config.downloadBaseUrl,
    manualDownloadUrl: config.manualDownloadUrl,
    logger
  });

  return { detector, orchestrator, output, logger, manualDownloadUrl: config.manualDownloadUrl };
}

/**
 * Create the check command
 */
export function createCheckCommand(): Command {
  const command = new Command('check');

  command
    .description('Check NVIDIA driver status and version')
    .option('--skip-update-check', 'Skip checking for driver updates (only show current info)')
    .action(async (_options: CheckOptions, cmd: Command) => {
      const options = cmd.optsWithGlobals<CheckOptions>();
      const output = new OutputFormatter();

      const envLoaded = loadEnvFile();
      if (envLoaded.isErr()) {
        output.error(envLoaded.error.message);
        process.exit(1);
      }

      const config = loadConfig();
      if (config.isErr()) {
        output.error(config.error.message);
        process.exit(1);
      }

      const logger = new Logger({
        logDir: config.value.logDir,
        level: config.value.logLevel,
        console: options.verbose ?? false
      });
      const startTime = Date.now();
      Logger.cleanOldLogs(config.value.logDir);

      const confirmer = new ReadlineConfirmer();
      let exitCode: number;
      try {
        exitCode = await runCheck(
          createCheckDependencies(config.value, output, logger, confirmer),
          options.skipUpdateCheck ?? false
        );
      } finally {
        confirmer.close();
      }

      logger.info('Command executed: check', {
        skipUpdateCheck: options.skipUpdateCheck ?? false,
        exitCode,
        duration_ms: Date.now() - startTime
      });
      process.exit(exitCode);
    });

  return command;
}
