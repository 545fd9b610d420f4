/**
 * Driver Artifact Downloader
 * Streams the installer to disk in fixed-size chunks with progress reporting
 */

import { chmod, open, stat, type FileHandle } from 'fs/promises';
import { ok, err, type Result } from 'neverthrow';
import { createDownloadTask, type DownloadTask } from '../../models/DownloadTask.js';
import type { OutputSink } from '../../models/OutputSink.js';
import {
  DownloadError,
  describeError,
  type DownloadFailureReason
} from '../../lib/errors/DriverErrors.js';
import { silentLogger, type StructuredLogger } from '../../cli/utils/logger.js';
import {
  BROWSER_USER_AGENT,
  DOWNLOAD_CHUNK_SIZE,
  DOWNLOAD_TIMEOUT_MS
} from '../../constants/driver-constants.js';
import type { FetchLike } from './RemoteVersionResolver.js';

type ResponseBody = NonNullable<Response['body']>;

export interface DownloaderOptions {
  output: OutputSink;
  userAgent?: string;

  /** Covers the whole transfer, not just the response headers */
  timeoutMs?: number;

  chunkSize?: number;
  fetch?: FetchLike;
  logger?: StructuredLogger;
}

// ---------------------------------------------------------------------------
// Chunked Read Loop
// ---------------------------------------------------------------------------

/**
 * Re-slice the response stream into chunkSize pieces; the last may be shorter
 */
export async function* readChunks(body: ResponseBody, chunkSize: number): AsyncGenerator<Buffer> {
  const reader = body.getReader();
  let buffered: Buffer = Buffer.alloc(0);

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffered = buffered.length === 0 ? Buffer.from(value) : Buffer.concat([buffered, value]);

      while (buffered.length >= chunkSize) {
        yield buffered.subarray(0, chunkSize);
        buffered = buffered.subarray(chunkSize);
      }
    }

    if (buffered.length > 0) {
      yield buffered;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Content-Length as a positive integer, otherwise undefined
 */
export function parseContentLength(header: string | null): number | undefined {
  if (header === null || !/^\d+$/.test(header.trim())) {
    return undefined;
  }
  const size = Number.parseInt(header.trim(), 10);
  return size > 0 ? size : undefined;
}

/**
 * Add execute permission for owner, group and others
 */
async function makeExecutable(path: string): Promise<void> {
  const { mode } = await stat(path);
  await chmod(path, mode | 0o111);
}

// ---------------------------------------------------------------------------
// Downloader
// ---------------------------------------------------------------------------

export class Downloader {
  private readonly output: OutputSink;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly chunkSize: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: StructuredLogger;

  constructor(options: DownloaderOptions) {
    this.output = options.output;
    this.userAgent = options.userAgent ?? BROWSER_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DOWNLOAD_TIMEOUT_MS;
    this.chunkSize = options.chunkSize ?? DOWNLOAD_CHUNK_SIZE;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Download url to destinationPath and mark it executable.
   *
   * A partial file is left behind on failure; the caller's temporary
   * directory owns its removal. There is no resume.
   */
  async download(url: string, destinationPath: string): Promise<Result<DownloadTask, DownloadError>> {
    const task = createDownloadTask(url, destinationPath);
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    let stage: 'request' | 'transfer' | 'write' = 'request';
    let file: FileHandle | undefined;

    this.output.info('Downloading driver...');
    this.output.line(`URL: ${url}`);
    this.output.line('This may take several minutes...');
    this.logger.info('Starting download', { url, destinationPath });

    try {
      const response = await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent },
        signal: controller.signal
      });

      if (!response.ok) {
        return this.fail(task, 'http-status', `HTTP ${response.status} ${response.statusText}`.trim());
      }
      if (!response.body) {
        return this.fail(task, 'empty-body', 'response has no body');
      }

      task.expectedSizeBytes = parseContentLength(response.headers.get('content-length'));
      if (task.expectedSizeBytes !== undefined) {
        this.output.line(`File size: ${(task.expectedSizeBytes / (1024 * 1024)).toFixed(1)} MB`);
      }

      stage = 'write';
      file = await open(destinationPath, 'w');

      stage = 'transfer';
      for await (const chunk of readChunks(response.body, this.chunkSize)) {
        stage = 'write';
        await file.write(chunk);
        stage = 'transfer';

        task.bytesTransferred += chunk.byteLength;
        if (task.expectedSizeBytes !== undefined) {
          this.output.progress(task.bytesTransferred / task.expectedSizeBytes);
        }
      }

      stage = 'write';
      await file.close();
      file = undefined;
      await makeExecutable(destinationPath);

      this.output.success(`Downloaded to: ${destinationPath}`);
      this.logger.info('Download complete', { destinationPath, bytes: task.bytesTransferred });
      return ok(task);
    } catch (error) {
      controller.abort();
      if (timedOut) {
        return this.fail(task, 'timeout', `timed out after ${this.timeoutMs / 1000}s`);
      }
      return this.fail(task, stage === 'write' ? 'write' : 'network', describeError(error));
    } finally {
      clearTimeout(timeout);
      if (file) {
        await file.close().catch((closeError: unknown) => {
          this.logger.warn('Failed to close partial download', { error: describeError(closeError) });
        });
      }
    }
  }

  private fail(task: DownloadTask, reason: DownloadFailureReason, detail: string): Result<never, DownloadError> {
    const error = new DownloadError(task.sourceUrl, reason, detail, task.bytesTransferred);
    this.output.error(error.message);
    this.logger.error('Download failed', error, {
      url: task.sourceUrl,
      reason,
      bytesTransferred: task.bytesTransferred
    });
    return err(error);
  }
}
