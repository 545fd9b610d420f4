import type { VersionIdentifier } from './DriverState.js';

export type UpdateCheckStatus =
  | 'up-to-date'
  | 'declined'
  | 'installed'
  | 'install-declined'
  | 'failed'
  | 'error';

/**
 * Outcome of a check-and-upgrade run
 */
export interface UpdateCheckResult {
  status: UpdateCheckStatus;
  currentVersion: VersionIdentifier;

  /** Absent when the remote index could not be read */
  latestVersion?: VersionIdentifier;

  error?: string;
}

export type InstallOutcome = { status: 'succeeded' } | { status: 'declined' };

/**
 * Lifecycle of one Installer.install() call
 */
export type InstallState =
  | 'awaiting-confirmation'
  | 'cancelled'
  | 'running'
  | 'succeeded'
  | 'failed'
  | 'timed-out';
