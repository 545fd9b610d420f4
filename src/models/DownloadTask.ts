/**
 * Download Task Model
 *
 * One artifact transfer. Created per download, mutated only by the Downloader
 * while the transfer runs.
 */
export interface DownloadTask {
  sourceUrl: string;
  destinationPath: string;

  /** From Content-Length; undefined when the server omits it */
  expectedSizeBytes?: number;

  bytesTransferred: number;
}

export function createDownloadTask(sourceUrl: string, destinationPath: string): DownloadTask {
  return {
    sourceUrl,
    destinationPath,
    bytesTransferred: 0
  };
}
