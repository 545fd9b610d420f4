import { ok, err, type Result } from 'neverthrow';
import type { VersionIdentifier } from '../../models/DriverState.js';
import { FetchError, describeError } from '../../lib/errors/DriverErrors.js';
import { silentLogger, type StructuredLogger } from '../../cli/utils/logger.js';
import {
  BROWSER_USER_AGENT,
  NVIDIA_LATEST_URL,
  VERSION_RESOLUTION_TIMEOUT_MS
} from '../../constants/driver-constants.js';

/**
 * The subset of the global fetch the update services call
 */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface RemoteVersionResolverOptions {
  indexUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: StructuredLogger;
}

/**
 * RemoteVersionResolver - reads the latest published driver version
 *
 * The index is a single plain-text line whose first whitespace-delimited token
 * is the version, e.g.
 * "580.105.08 580.105.08/NVIDIA-Linux-x86_64-580.105.08.run".
 */
export class RemoteVersionResolver {
  private readonly indexUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: StructuredLogger;

  constructor(options: RemoteVersionResolverOptions = {}) {
    this.indexUrl = options.indexUrl ?? NVIDIA_LATEST_URL;
    this.userAgent = options.userAgent ?? BROWSER_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? VERSION_RESOLUTION_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Fetch the latest version identifier. Never throws.
   */
  async fetchLatestVersion(): Promise<Result<VersionIdentifier, FetchError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    this.logger.debug('Resolving latest driver version', { url: this.indexUrl });

    try {
      const response = await this.fetchImpl(this.indexUrl, {
        headers: { 'User-Agent': this.userAgent },
        signal: controller.signal
      });

      if (!response.ok) {
        return this.fail(
          new FetchError(this.indexUrl, 'http-status', `HTTP ${response.status} ${response.statusText}`.trim(), response.status)
        );
      }

      const body = await response.text();
      return this.parseIndex(body);
    } catch (error) {
      if (controller.signal.aborted) {
        return this.fail(new FetchError(this.indexUrl, 'timeout', `timed out after ${this.timeoutMs / 1000}s`));
      }
      return this.fail(new FetchError(this.indexUrl, 'network', describeError(error)));
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * First token of the body, provided it carries at least one digit
   */
  private parseIndex(body: string): Result<VersionIdentifier, FetchError> {
    const token = body.trim().split(/\s+/)[0] ?? '';

    if (token.length === 0) {
      return this.fail(new FetchError(this.indexUrl, 'empty-body', 'empty response'));
    }
    if (!/\d/.test(token)) {
      return this.fail(new FetchError(this.indexUrl, 'unparseable', `unexpected index content '${token.slice(0, 40)}'`));
    }

    this.logger.info('Resolved latest driver version', { version: token });
    return ok(token);
  }

  private fail(error: FetchError): Result<never, FetchError> {
    this.logger.warn('Latest version lookup failed', { reason: error.reason, error: error.message });
    return err(error);
  }
}
