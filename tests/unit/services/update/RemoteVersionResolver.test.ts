import { describe, it, expect } from 'vitest';
import { RemoteVersionResolver } from '../../../../src/services/update/RemoteVersionResolver.js';
import { hangingFetch, staticFetch } from '../../../helpers/fakes.js';

const INDEX_URL = 'https://downloads.example.test/latest.txt';

describe('RemoteVersionResolver', () => {
  it('should return the first token of the index', async () => {
    const { fetch } = staticFetch('580.105.08 580.105.08/NVIDIA-Linux-x86_64-580.105.08.run\n');
    const resolver = new RemoteVersionResolver({ indexUrl: INDEX_URL, fetch });

    const result = await resolver.fetchLatestVersion();

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toBe('580.105.08');
  });

  it('should send the configured user agent to the index url', async () => {
    const { fetch, calls } = staticFetch('580.105.08');
    const resolver = new RemoteVersionResolver({ indexUrl: INDEX_URL, userAgent: 'test-agent/1.0', fetch });

    await resolver.fetchLatestVersion();

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe(INDEX_URL);
    expect(new Headers(calls[0]?.init?.headers).get('user-agent')).toBe('test-agent/1.0');
  });

  it('should fail with http-status on a non-success response', async () => {
    const { fetch } = staticFetch('not here', { status: 404, statusText: 'Not Found' });
    const resolver = new RemoteVersionResolver({ indexUrl: INDEX_URL, fetch });

    const error = (await resolver.fetchLatestVersion())._unsafeUnwrapErr();

    expect(error.reason).toBe('http-status');
    expect(error.status).toBe(404);
    expect(error.message).toBe(`Could not fetch latest driver version from ${INDEX_URL}: HTTP 404 Not Found`);
  });

  it('should fail with empty-body on a blank index', async () => {
    const { fetch } = staticFetch('   \n');
    const resolver = new RemoteVersionResolver({ indexUrl: INDEX_URL, fetch });

    const error = (await resolver.fetchLatestVersion())._unsafeUnwrapErr();

    expect(error.reason).toBe('empty-body');
  });

  it('should fail with unparseable when the first token has no digits', async () => {
    const { fetch } = staticFetch('<html><body>maintenance</body></html>');
    const resolver = new RemoteVersionResolver({ indexUrl: INDEX_URL, fetch });

    const error = (await resolver.fetchLatestVersion())._unsafeUnwrapErr();

    expect(error.reason).toBe('unparseable');
  });

  it('should fail with network when fetch rejects', async () => {
    const resolver = new RemoteVersionResolver({
      indexUrl: INDEX_URL,
      fetch: async () => {
        throw new TypeError('fetch failed');
      }
    });

    const error = (await resolver.fetchLatestVersion())._unsafeUnwrapErr();

    expect(error.reason).toBe('network');
    expect(error.message).toBe(`Could not fetch latest driver version from ${INDEX_URL}: fetch failed`);
  });

  it('should fail with timeout when the server never answers', async () => {
    const resolver = new RemoteVersionResolver({ indexUrl: INDEX_URL, timeoutMs: 20, fetch: hangingFetch() });

    const error = (await resolver.fetchLatestVersion())._unsafeUnwrapErr();

    expect(error.reason).toBe('timeout');
    expect(error.retryable).toBe(true);
  });
});
