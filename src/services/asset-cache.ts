import { createHash } from 'node:crypto';
import { mkdir, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { BackendOperationError } from '../core/errors.js';
import type { FetchLike } from '../types/backends.js';
import { logThought } from '../utils/logger.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';

/** A file a backend needs locally before it can serve requests (voice model, config). */
export interface AssetDescriptor {
  /** Stable identifier, also used for the on-disk file name unless `filename` is set. */
  name: string;
  url: string;
  filename?: string;
  /** Expected hex digest; a mismatch fails the download and is retried. */
  sha256?: string;
}

export interface AssetCacheOptions {
  /** Directory the assets are stored in. */
  directory: string;
  fetchImpl?: FetchLike;
  retry?: Omit<RetryOptions, 'label'>;
}

function sha256(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Idempotent fetch-and-cache for backend assets.
 *
 * Downloads land in a temp file and are renamed into place, so a crash never leaves a partial
 * asset under its final name. Concurrent `ensure` calls for one asset share a single download.
 */
export class AssetCache {
  readonly #directory: string;
  readonly #fetch: FetchLike;
  readonly #retry: Omit<RetryOptions, 'label'>;
  readonly #inflight: Map<string, Promise<string>> = new Map();

  constructor(options: AssetCacheOptions) {
    this.#directory = path.resolve(options.directory);
    this.#fetch = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.#retry = options.retry ?? { maxAttempts: 3, baseDelayMs: 500 };
  }

  get directory(): string {
    return this.#directory;
  }

  pathFor(asset: AssetDescriptor): string {
    return path.join(this.#directory, asset.filename ?? path.basename(asset.name));
  }

  /** True when the asset is on disk (and matches its digest, when one is declared). */
  async has(asset: AssetDescriptor): Promise<boolean> {
    const target = this.pathFor(asset);
    try {
      const info = await stat(target);
      if (!info.isFile() || info.size === 0) {
        return false;
      }
      if (!asset.sha256) {
        return true;
      }
      return sha256(await readFile(target)) === asset.sha256.toLowerCase();
    } catch {
      return false;
    }
  }

  /** Resolve the local path of `asset`, downloading it first when missing. */
  ensure(asset: AssetDescriptor, signal?: AbortSignal): Promise<string> {
    const target = this.pathFor(asset);
    const existing = this.#inflight.get(target);
    if (existing) {
      return existing;
    }

    const pending = this.#ensure(asset, target, signal).finally(() => {
      this.#inflight.delete(target);
    });
    this.#inflight.set(target, pending);
    return pending;
  }

  async #ensure(asset: AssetDescriptor, target: string, signal?: AbortSignal): Promise<string> {
    if (await this.has(asset)) {
      return target;
    }

    await mkdir(this.#directory, { recursive: true });
    const result = await withRetry(() => this.#download(asset, target, signal), {
      ...this.#retry,
      label: `asset:${asset.name}`,
    });

    if (!result.ok) {
      throw new BackendOperationError({
        code: 'asset_download_failed',
        message: `Could not fetch asset '${asset.name}' after ${result.attempts} attempt(s): ${result.error ?? 'unknown error'}`,
        backendId: asset.name,
        remediation: `Check network access to ${asset.url} or place the file at ${target} manually.`,
      });
    }

    void logThought(`[AssetCache] Stored '${asset.name}' at ${target}.`);
    return target;
  }

  async #download(asset: AssetDescriptor, target: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new Error('download aborted');
    }
    const response = await this.#fetch(asset.url, { signal });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} from ${asset.url}`);
    }

    const data = Buffer.from(await response.arrayBuffer());
    if (data.length === 0) {
      throw new Error(`empty body from ${asset.url}`);
    }
    if (asset.sha256 && sha256(data) !== asset.sha256.toLowerCase()) {
      throw new Error(`checksum mismatch for '${asset.name}'`);
    }

    const tempPath = `${target}.${process.pid}.${Date.now()}.tmp`;
    try {
      await writeFile(tempPath, data);
      await rename(tempPath, target);
    } catch (error) {
      await unlink(tempPath).catch(() => undefined);
      throw error;
    }
  }
}
