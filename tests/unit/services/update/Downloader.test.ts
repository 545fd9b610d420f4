import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Downloader, parseContentLength, readChunks } from '../../../../src/services/update/Downloader.js';
import type { FetchLike } from '../../../../src/services/update/RemoteVersionResolver.js';
import { RecordingSink, failingStream, hangingFetch, staticFetch } from '../../../helpers/fakes.js';

const ARTIFACT_URL = 'https://downloads.example.test/580.105.08/NVIDIA-Linux-x86_64-580.105.08.run';

function payload(size: number): Uint8Array {
  const bytes = new Uint8Array(size);
  for (let i = 0; i < size; i++) {
    bytes[i] = i % 251;
  }
  return bytes;
}

describe('Downloader', () => {
  let workDir: string;
  let sink: RecordingSink;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'downloader-test-'));
    sink = new RecordingSink();
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  describe('download', () => {
    it('should write the exact body and mark the file executable', async () => {
      const body = payload(20000);
      const { fetch } = staticFetch(body, { headers: { 'content-length': '20000' } });
      const destination = join(workDir, 'driver.run');
      const downloader = new Downloader({ output: sink, fetch });

      const result = await downloader.download(ARTIFACT_URL, destination);

      expect(result.isOk()).toBe(true);
      const task = result._unsafeUnwrap();
      expect(task.bytesTransferred).toBe(20000);
      expect(task.expectedSizeBytes).toBe(20000);

      const written = await readFile(destination);
      expect(written.equals(Buffer.from(body))).toBe(true);

      const { mode } = await stat(destination);
      expect(mode & 0o111).toBe(0o111);
    });

    it('should report progress once per 8 KiB chunk, ending at 1', async () => {
      const { fetch } = staticFetch(payload(20000), { headers: { 'content-length': '20000' } });
      const downloader = new Downloader({ output: sink, fetch });

      await downloader.download(ARTIFACT_URL, join(workDir, 'driver.run'));

      expect(sink.progressValues()).toEqual([8192 / 20000, 16384 / 20000, 1]);
    });

    it('should announce the transfer and its size', async () => {
      const { fetch } = staticFetch(payload(2 * 1024 * 1024), { headers: { 'content-length': String(2 * 1024 * 1024) } });
      const destination = join(workDir, 'driver.run');
      const downloader = new Downloader({ output: sink, fetch });

      await downloader.download(ARTIFACT_URL, destination);

      expect(sink.messages('info')).toEqual(['Downloading driver...']);
      expect(sink.messages('line')).toEqual([
        `URL: ${ARTIFACT_URL}`,
        'This may take several minutes...',
        'File size: 2.0 MB'
      ]);
      expect(sink.messages('success')).toEqual([`Downloaded to: ${destination}`]);
    });

    it('should skip progress when the size is unknown', async () => {
      const { fetch } = staticFetch(payload(100));
      const downloader = new Downloader({ output: sink, fetch });

      const result = await downloader.download(ARTIFACT_URL, join(workDir, 'driver.run'));

      expect(result._unsafeUnwrap().bytesTransferred).toBe(100);
      expect(sink.progressValues()).toEqual([]);
    });

    it('should send the configured user agent', async () => {
      const { fetch, calls } = staticFetch(payload(10));
      const downloader = new Downloader({ output: sink, userAgent: 'test-agent/1.0', fetch });

      await downloader.download(ARTIFACT_URL, join(workDir, 'driver.run'));

      expect(new Headers(calls[0]?.init?.headers).get('user-agent')).toBe('test-agent/1.0');
    });

    it('should fail with http-status on a non-success response', async () => {
      const { fetch } = staticFetch('missing', { status: 404, statusText: 'Not Found' });
      const downloader = new Downloader({ output: sink, fetch });

      const error = (await downloader.download(ARTIFACT_URL, join(workDir, 'driver.run')))._unsafeUnwrapErr();

      expect(error.reason).toBe('http-status');
      expect(error.message).toBe('Download failed: HTTP 404 Not Found');
      expect(sink.messages('error')).toEqual(['Download failed: HTTP 404 Not Found']);
    });

    it('should fail with network when the stream breaks mid-transfer', async () => {
      const fetch: FetchLike = async () =>
        new Response(failingStream([payload(1000)], new Error('connection reset')));
      const downloader = new Downloader({ output: sink, fetch });

      const error = (await downloader.download(ARTIFACT_URL, join(workDir, 'driver.run')))._unsafeUnwrapErr();

      expect(error.reason).toBe('network');
      expect(error.retryable).toBe(true);
    });

    it('should fail with write when the destination cannot be created', async () => {
      const { fetch } = staticFetch(payload(10));
      const downloader = new Downloader({ output: sink, fetch });

      const error = (await downloader.download(ARTIFACT_URL, join(workDir, 'missing', 'driver.run')))._unsafeUnwrapErr();

      expect(error.reason).toBe('write');
    });

    it('should fail with timeout when the server never answers', async () => {
      const downloader = new Downloader({ output: sink, timeoutMs: 20, fetch: hangingFetch() });

      const error = (await downloader.download(ARTIFACT_URL, join(workDir, 'driver.run')))._unsafeUnwrapErr();

      expect(error.reason).toBe('timeout');
    });
  });

  describe('readChunks', () => {
    it('should re-slice arbitrary network chunks into fixed pieces', async () => {
      const sizes: number[] = [];
      const body = new Response(payload(10)).body;
      expect(body).not.toBeNull();
      if (!body) return;

      for await (const chunk of readChunks(body, 4)) {
        sizes.push(chunk.byteLength);
      }

      expect(sizes).toEqual([4, 4, 2]);
    });
  });

  describe('parseContentLength', () => {
    it('should accept positive integers only', () => {
      expect(parseContentLength('1024')).toBe(1024);
      expect(parseContentLength(' 42 ')).toBe(42);
      expect(parseContentLength('0')).toBeUndefined();
      expect(parseContentLength('-5')).toBeUndefined();
      expect(parseContentLength('abc')).toBeUndefined();
      expect(parseContentLength(null)).toBeUndefined();
    });
  });
});
