/**
 * Endpoints, timeouts and naming for the NVIDIA Linux driver channel
 *
 * @module driver-constants
 */

/**
 * Plain-text index, e.g. "580.105.08 580.105.08/NVIDIA-Linux-x86_64-580.105.08.run"
 */
export const NVIDIA_LATEST_URL = 'https://download.nvidia.com/XFree86/Linux-x86_64/latest.txt';

/**
 * Artifacts live at <base>/<version>/<artifact>
 */
export const NVIDIA_DOWNLOAD_BASE = 'https://download.nvidia.com/XFree86/Linux-x86_64';

/**
 * Where users are sent whenever the automated path gives up
 */
export const NVIDIA_MANUAL_DOWNLOAD_URL = 'https://www.nvidia.com/Download/index.aspx';

/**
 * download.nvidia.com rejects some default client agents
 */
export const BROWSER_USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36';

export const DEFAULT_SMI_COMMAND = 'nvidia-smi';
export const DEFAULT_ELEVATION_COMMAND = 'sudo';

export const DETECTION_TIMEOUT_MS = 5_000;
export const VERSION_RESOLUTION_TIMEOUT_MS = 10_000;
export const DOWNLOAD_TIMEOUT_MS = 300_000;
export const INSTALL_TIMEOUT_MS = 600_000;

/**
 * Write granularity for the artifact download (8 KiB)
 */
export const DOWNLOAD_CHUNK_SIZE = 8192;

/**
 * mkdtemp prefix for the scoped download directory
 */
export const TEMP_DIR_PREFIX = 'nvidia-driver-';

/**
 * Installer file name for a version
 */
export function getArtifactFilename(version: string): string {
  return `NVIDIA-Linux-x86_64-${version}.run`;
}

/**
 * Full artifact URL for a version
 */
export function getDownloadUrl(version: string, baseUrl: string = NVIDIA_DOWNLOAD_BASE): string {
  return `${baseUrl.replace(/\/+$/, '')}/${version}/${getArtifactFilename(version)}`;
}
