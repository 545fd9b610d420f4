/**
 * Scoped temporary directory
 *
 * Holds the downloaded installer. Acquired before a download and released
 * (recursively removed) on every exit path of the step that created it.
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

export class TempDirectory {
  private released = false;

  private constructor(public readonly path: string) {}

  static async acquire(prefix: string, parentDir: string = tmpdir()): Promise<TempDirectory> {
    const path = await mkdtemp(join(parentDir, prefix));
    return new TempDirectory(path);
  }

  /**
   * Path of an entry inside the directory
   */
  resolve(name: string): string {
    return join(this.path, name);
  }

  isReleased(): boolean {
    return this.released;
  }

  /**
   * Remove the directory and everything in it. Safe to call twice.
   */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await rm(this.path, { recursive: true, force: true });
  }
}

export interface TempDirectoryScopeOptions {
  /** Where to create the directory (default: OS temp dir) */
  parentDir?: string;

  /** Receives a failed removal instead of it being thrown */
  onReleaseError?: (error: unknown, dir: TempDirectory) => void;
}

/**
 * Run fn with a fresh temporary directory that is removed afterwards,
 * whether fn returns or throws.
 */
export async function withTempDirectory<T>(
  prefix: string,
  fn: (dir: TempDirectory) => Promise<T>,
  options: TempDirectoryScopeOptions = {}
): Promise<T> {
  const dir = await TempDirectory.acquire(prefix, options.parentDir);
  try {
    return await fn(dir);
  } finally {
    try {
      await dir.release();
    } catch (error) {
      if (!options.onReleaseError) {
        throw error;
      }
      options.onReleaseError(error, dir);
    }
  }
}
