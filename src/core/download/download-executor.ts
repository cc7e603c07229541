/**
 * Download Executor
 *
 * Fetches one release file, verifies its sha1 while streaming, and places it
 * in a resource directory. The body is written to `<fileName>.part` and only
 * renamed into place once the hash matches, so a failed or aborted transfer
 * never leaves a file under its final name.
 */

import { createHash } from 'crypto';
import { createWriteStream } from 'fs';
import { basename, join, resolve } from 'path';
import { pipeline } from 'stream/promises';
import { setTimeout as delay } from 'timers/promises';
import fetch, { type Response } from 'node-fetch';
import type { FetchLike } from '../registry/modrinth-client.js';
import { DEFAULTS, FILE_PATTERNS } from '../../constants/index.js';
import { ensureDir, getFileSize, isFile, remove, renamePath } from '../../utils/fs.js';
import { sha1File, normalizeHash } from '../../utils/hash.js';
import { KeyedMutex } from '../../utils/keyed-mutex.js';
import { DownloadError, IntegrityError, ValidationError, isAbortError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export type ProgressListener = (receivedBytes: number, totalBytes?: number) => void;

export interface DownloadRequest {
  url: string;
  /** sha1, hex */
  expectedHash: string;
  fileName: string;
  destinationDir: string;
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

export interface LocalFileHandle {
  path: string;
  fileName: string;
  hash: string;
  size: number;
  /** True when a matching file was already in place and nothing was fetched */
  reused: boolean;
}

export interface FileDownloader {
  downloadFile(request: DownloadRequest): Promise<LocalFileHandle>;
}

export interface DownloadExecutorOptions {
  fetchImpl?: FetchLike;
  userAgent?: string;
  /** Extra attempts after a failed transfer */
  retries?: number;
  /** Base delay between attempts; attempt n waits n * retryDelayMs */
  retryDelayMs?: number;
}

function isRetryable(error: unknown): boolean {
  if (isAbortError(error) || error instanceof IntegrityError) {
    return false;
  }
  return error instanceof DownloadError && error.retryable;
}

export class DownloadExecutor implements FileDownloader {
  private readonly fetchImpl: FetchLike;
  private readonly userAgent: string;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly locks = new KeyedMutex();

  constructor(options: DownloadExecutorOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.userAgent = options.userAgent ?? DEFAULTS.USER_AGENT;
    this.retries = Math.max(0, options.retries ?? DEFAULTS.RETRIES);
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? 500);
  }

  async downloadFile(request: DownloadRequest): Promise<LocalFileHandle> {
    if (!request.fileName || basename(request.fileName) !== request.fileName) {
      throw new ValidationError(`invalid file name '${request.fileName}'`);
    }
    if (!request.url) {
      throw new ValidationError(`no download URL for ${request.fileName}`);
    }

    // Placements of one target file are serialised; different files transfer in parallel
    const directory = resolve(request.destinationDir);
    return this.locks.runExclusive(join(directory, request.fileName), () =>
      this.place({ ...request, destinationDir: directory })
    );
  }

  private async place(request: DownloadRequest): Promise<LocalFileHandle> {
    const expectedHash = normalizeHash(request.expectedHash);
    const target = join(request.destinationDir, request.fileName);
    await ensureDir(request.destinationDir);

    if (await isFile(target)) {
      const existingHash = await sha1File(target);
      if (existingHash === expectedHash) {
        logger.debug(`Already in place: ${target}`);
        return {
          path: target,
          fileName: request.fileName,
          hash: existingHash,
          size: await getFileSize(target),
          reused: true
        };
      }
      logger.debug(`Replacing ${target}: content differs`, { existingHash, expectedHash });
    }

    for (let attempt = 0; ; attempt++) {
      request.signal?.throwIfAborted();
      try {
        return await this.transfer(request, target, expectedHash);
      } catch (error) {
        if (!isRetryable(error) || attempt >= this.retries) {
          throw error;
        }
        const wait = this.retryDelayMs * (attempt + 1);
        logger.warn(`Download of ${request.fileName} failed, retrying in ${wait}ms`, { error });
        await delay(wait, undefined, request.signal ? { signal: request.signal } : undefined);
      }
    }
  }

  private async transfer(request: DownloadRequest, target: string, expectedHash: string): Promise<LocalFileHandle> {
    const partPath = `${target}${FILE_PATTERNS.PART_SUFFIX}`;

    let res: Response;
    try {
      res = await this.fetchImpl(request.url, {
        headers: { 'User-Agent': this.userAgent },
        ...(request.signal ? { signal: request.signal } : {})
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      throw new DownloadError(`${request.fileName}: ${error instanceof Error ? error.message : String(error)}`, {
        url: request.url,
        error
      });
    }

    if (!res.ok || !res.body) {
      const retryable = res.status >= 500 || res.status === 408 || res.status === 429;
      throw new DownloadError(
        `${request.fileName}: server responded ${res.status}`,
        { url: request.url, status: res.status },
        retryable
      );
    }

    const lengthHeader = Number(res.headers.get('content-length'));
    const total = Number.isFinite(lengthHeader) && lengthHeader > 0 ? lengthHeader : undefined;
    const hasher = createHash('sha1');
    let received = 0;
    const onProgress = request.onProgress;

    try {
      await pipeline(
        res.body,
        async function* (source: AsyncIterable<Buffer | string>) {
          for await (const chunk of source) {
            const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
            hasher.update(bytes);
            received += bytes.length;
            onProgress?.(received, total);
            yield bytes;
          }
        },
        createWriteStream(partPath),
        request.signal ? { signal: request.signal } : {}
      );
    } catch (error) {
      await remove(partPath);
      if (isAbortError(error)) throw error;
      throw new DownloadError(`${request.fileName}: transfer interrupted`, { url: request.url, error });
    }

    const actualHash = hasher.digest('hex');
    if (actualHash !== expectedHash) {
      await remove(partPath);
      logger.error(`Checksum mismatch for ${request.fileName}`, { url: request.url, expectedHash, actualHash });
      throw new IntegrityError(request.fileName, expectedHash, actualHash);
    }

    await renamePath(partPath, target);
    logger.info(`Downloaded ${request.fileName} (${received} bytes)`);

    return {
      path: target,
      fileName: request.fileName,
      hash: actualHash,
      size: received,
      reused: false
    };
  }
}
