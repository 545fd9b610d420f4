/**
 * Update Orchestration
 * Coordinates version resolution, comparison, download and installation
 */

import type { Confirmer, OutputSink } from '../../models/OutputSink.js';
import { isAffirmative } from '../../models/OutputSink.js';
import type { VersionIdentifier } from '../../models/DriverState.js';
import type { UpdateCheckResult } from '../../models/UpdateCheckResult.js';
import { withTempDirectory } from '../../lib/temp-directory.js';
import { describeError } from '../../lib/errors/DriverErrors.js';
import { silentLogger, type StructuredLogger } from '../../cli/utils/logger.js';
import {
  NVIDIA_DOWNLOAD_BASE,
  NVIDIA_MANUAL_DOWNLOAD_URL,
  TEMP_DIR_PREFIX,
  getArtifactFilename,
  getDownloadUrl
} from '../../constants/driver-constants.js';
import { VersionComparison, compareVersions } from './VersionComparator.js';
import type { RemoteVersionResolver } from './RemoteVersionResolver.js';
import type { Downloader } from './Downloader.js';
import type { Installer } from './Installer.js';

export type VersionSource = Pick<RemoteVersionResolver, 'fetchLatestVersion'>;
export type ArtifactDownloader = Pick<Downloader, 'download'>;
export type DriverInstaller = Pick<Installer, 'install'>;

/**
 * How one download-then-install attempt ended
 */
type InstallRunStatus = 'succeeded' | 'declined' | 'failed';

export interface UpdateOrchestratorOptions {
  resolver: VersionSource;
  downloader: ArtifactDownloader;
  installer: DriverInstaller;
  output: OutputSink;
  confirmer: Confirmer;
  downloadBaseUrl?: string;
  manualDownloadUrl?: string;

  /** Parent of the scoped download directory (default: OS temp dir) */
  tempRoot?: string;

  logger?: StructuredLogger;
}

export class UpdateOrchestrator {
  private readonly resolver: VersionSource;
  private readonly downloader: ArtifactDownloader;
  private readonly installer: DriverInstaller;
  private readonly output: OutputSink;
  private readonly confirmer: Confirmer;
  private readonly downloadBaseUrl: string;
  private readonly manualDownloadUrl: string;
  private readonly tempRoot: string | undefined;
  private readonly logger: StructuredLogger;

  constructor(options: UpdateOrchestratorOptions) {
    this.resolver = options.resolver;
    this.downloader = options.downloader;
    this.installer = options.installer;
    this.output = options.output;
    this.confirmer = options.confirmer;
    this.downloadBaseUrl = options.downloadBaseUrl ?? NVIDIA_DOWNLOAD_BASE;
    this.manualDownloadUrl = options.manualDownloadUrl ?? NVIDIA_MANUAL_DOWNLOAD_URL;
    this.tempRoot = options.tempRoot;
    this.logger = options.logger ?? silentLogger;
  }

  // -------------------------------------------------------------------------
  // Fresh Install (no driver present)
  // -------------------------------------------------------------------------

  async installFresh(): Promise<boolean> {
    this.output.line();
    this.output.info('Fetching latest NVIDIA driver version...');

    const latest = await this.resolver.fetchLatestVersion();
    if (latest.isErr()) {
      this.reportResolutionFailure(latest.error.message);
      return false;
    }

    this.output.line(`Latest available version: ${latest.value}`);
    this.output.line();

    const answer = await this.confirmer.ask('Would you like to download and install it? (yes/no): ');
    if (!isAffirmative(answer)) {
      this.output.line('Installation cancelled. To install manually, visit:');
      this.output.line(this.manualDownloadUrl);
      this.logger.info('Fresh install declined', { latestVersion: latest.value });
      return false;
    }

    return this.downloadAndInstall(latest.value);
  }

  // -------------------------------------------------------------------------
  // Check and Upgrade (driver present)
  // -------------------------------------------------------------------------

  async checkForUpdates(currentVersion: VersionIdentifier): Promise<UpdateCheckResult> {
    this.output.line();
    this.output.info('Checking for driver updates...');

    const latest = await this.resolver.fetchLatestVersion();
    if (latest.isErr()) {
      this.reportResolutionFailure(latest.error.message);
      return { status: 'error', currentVersion, error: latest.error.message };
    }

    const latestVersion = latest.value;
    this.output.line(`Current version: ${currentVersion}`);
    this.output.line(`Latest version:  ${latestVersion}`);
    this.output.line();

    const comparison = compareVersions(currentVersion, latestVersion);
    this.logger.info('Version comparison', { currentVersion, latestVersion, comparison });

    if (comparison === VersionComparison.OLDER) {
      this.output.success('Your driver is up to date (or newer than latest release)');
      return { status: 'up-to-date', currentVersion, latestVersion };
    }
    if (comparison === VersionComparison.EQUAL) {
      this.output.success('Your driver is up to date');
      return { status: 'up-to-date', currentVersion, latestVersion };
    }

    this.output.info('A newer driver version is available!');
    this.output.line();

    const answer = await this.confirmer.ask('Would you like to download and install it? (yes/no): ');
    if (!isAffirmative(answer)) {
      this.output.line('Update cancelled. To update manually, visit:');
      this.output.line(this.manualDownloadUrl);
      return { status: 'declined', currentVersion, latestVersion };
    }

    const outcome = await this.runInstall(latestVersion);
    switch (outcome) {
      case 'succeeded':
        return { status: 'installed', currentVersion, latestVersion };
      case 'declined':
        return { status: 'install-declined', currentVersion, latestVersion };
      case 'failed':
        return { status: 'failed', currentVersion, latestVersion };
    }
  }

  // -------------------------------------------------------------------------
  // Shared Download-then-Install
  // -------------------------------------------------------------------------

  /**
   * Download the given version into a scoped temporary directory and run its
   * installer. The directory is removed on every exit path.
   */
  async downloadAndInstall(version: VersionIdentifier): Promise<boolean> {
    return (await this.runInstall(version)) === 'succeeded';
  }

  private async runInstall(version: VersionIdentifier): Promise<InstallRunStatus> {
    const url = getDownloadUrl(version, this.downloadBaseUrl);

    try {
      return await withTempDirectory(
        TEMP_DIR_PREFIX,
        async (dir): Promise<InstallRunStatus> => {
          const artifactPath = dir.resolve(getArtifactFilename(version));

          const downloaded = await this.downloader.download(url, artifactPath);
          if (downloaded.isErr()) {
            this.output.error('Download failed. Please try manually:');
            this.output.line(`Visit: ${this.manualDownloadUrl}`);
            return 'failed';
          }

          const installed = await this.installer.install(artifactPath);
          return installed.isOk() ? installed.value.status : 'failed';
        },
        {
          parentDir: this.tempRoot,
          onReleaseError: (error, dir) => {
            this.output.warning(`Could not remove temporary files in ${dir.path}`);
            this.logger.warn('Temporary directory cleanup failed', { path: dir.path, error: describeError(error) });
          }
        }
      );
    } catch (error) {
      this.output.error(`Could not create the download directory: ${describeError(error)}`);
      this.output.line(`Visit: ${this.manualDownloadUrl}`);
      this.logger.error('Temporary directory failure', error, { version });
      return 'failed';
    }
  }

  private reportResolutionFailure(detail: string): void {
    this.output.warning('Could not determine latest driver version');
    this.output.line(`Please check manually at: ${this.manualDownloadUrl}`);
    this.logger.warn('Update flow aborted: latest version unknown', { error: detail });
  }
}
