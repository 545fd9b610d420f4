/**
 * Driver State Model
 *
 * Snapshot of the installed NVIDIA driver as reported by nvidia-smi.
 */

/**
 * A string naming a driver release, e.g. "580.105.08".
 * Only its digit runs matter when comparing.
 */
export type VersionIdentifier = string;

export interface GPUInfo {
  /** GPU model name */
  gpuName?: string;

  /** Highest CUDA version the driver supports, e.g. "13.0" */
  cudaVersion?: string;

  /** Memory fields keep nvidia-smi's units, e.g. "24576 MiB" */
  memoryTotal?: string;
  memoryUsed?: string;
  memoryFree?: string;
}

export interface DriverState extends GPUInfo {
  /** Installed driver version */
  version: VersionIdentifier;
}

/**
 * True when every memory field was reported
 */
export function hasMemoryInfo(
  info: GPUInfo
): info is GPUInfo & Required<Pick<GPUInfo, 'memoryTotal' | 'memoryUsed' | 'memoryFree'>> {
  return (
    info.memoryTotal !== undefined &&
    info.memoryUsed !== undefined &&
    info.memoryFree !== undefined
  );
}
