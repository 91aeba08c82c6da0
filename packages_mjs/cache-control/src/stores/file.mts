/**
 * Filesystem cache stores
 *
 * Directory structure (SHA-224 of the cache key, first five characters
 * fanned out as directories):
 * ```
 * <directory>/
 * └── 3/
 *     └── f/
 *         └── a/
 *             └── 0/
 *                 └── 1/
 *                     ├── 3fa01c9e...      metadata (or the whole entry)
 *                     ├── 3fa01c9e....body body, separate-body store only
 *                     └── 3fa01c9e....lock held while writing
 * ```
 */

import { createHash } from 'node:crypto';
import path from 'node:path';
import type { Readable } from 'node:stream';
import fs from 'fs-extra';
import lockfile from 'proper-lockfile';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';
import { CacheStorageError, isErrnoException } from '../errors.mjs';
import { deriveCacheKey } from '../key.mjs';
import { componentLogger } from '../logger.mjs';
import type {
  CacheKeyDeriver,
  SeparateBodyCacheStore,
  UnifiedCacheStore,
} from '../types.mjs';

const BODY_SUFFIX = '.body';
const LOCK_SUFFIX = '.lock';

/**
 * Options for filesystem cache stores
 */
export interface FileCacheStoreOptions {
  /** Root directory of the cache */
  directory: string;
  /** Never delete files. Default: false */
  forever?: boolean;
  /** Mode of cache files. Default: 0o600 */
  fileMode?: number;
  /** Mode of created directories. Default: 0o700 */
  dirMode?: number;
  /** Attempts to take a held write lock before giving up. Default: 20 */
  lockRetries?: number;
  /** Age after which a lock is considered abandoned. Default: 10000 */
  lockStaleMs?: number;
  logger?: Logger;
}

function isNotFound(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

/**
 * Write to a freshly created file, then move it over the target. The
 * temporary file is opened exclusively and never through a symlink.
 */
async function secureWrite(filePath: string, data: Buffer, mode: number): Promise<void> {
  const tempPath = `${filePath}.${uuidv4()}.tmp`;
  const flags =
    fs.constants.O_WRONLY |
    fs.constants.O_CREAT |
    fs.constants.O_EXCL |
    (fs.constants.O_NOFOLLOW ?? 0);

  const fd = await fs.open(tempPath, flags, mode);
  try {
    try {
      await fs.writeFile(fd, data);
    } finally {
      await fs.close(fd);
    }
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.remove(tempPath);
    throw error;
  }
}

/**
 * Layout, locking and file I/O shared by both filesystem stores
 */
abstract class BaseFileCacheStore {
  protected readonly directory: string;
  protected readonly forever: boolean;
  protected readonly fileMode: number;
  protected readonly dirMode: number;
  protected readonly lockRetries: number;
  protected readonly lockStaleMs: number;
  protected readonly logger: Logger;

  constructor(options: FileCacheStoreOptions) {
    this.directory = options.directory;
    this.forever = options.forever ?? false;
    this.fileMode = options.fileMode ?? 0o600;
    this.dirMode = options.dirMode ?? 0o700;
    this.lockRetries = options.lockRetries ?? 20;
    this.lockStaleMs = options.lockStaleMs ?? 10000;
    this.logger = options.logger ?? componentLogger('file-store');
  }

  static encode(key: string): string {
    return createHash('sha224').update(key).digest('hex');
  }

  /**
   * Path of the file holding a key. Changing this layout orphans every
   * existing cache directory.
   */
  pathFor(key: string): string {
    const hashed = BaseFileCacheStore.encode(key);
    return path.join(this.directory, ...hashed.slice(0, 5).split(''), hashed);
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }

  protected async readFile(filePath: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  protected async writeFile(key: string, filePath: string, data: Buffer): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(filePath), { mode: this.dirMode });

      const release = await lockfile.lock(filePath, {
        realpath: false,
        lockfilePath: filePath + LOCK_SUFFIX,
        stale: this.lockStaleMs,
        retries: { retries: this.lockRetries, factor: 1.5, minTimeout: 10, maxTimeout: 200 },
      });
      try {
        await secureWrite(filePath, data, this.fileMode);
      } finally {
        await release();
      }
    } catch (error) {
      throw new CacheStorageError(`Failed to write cache file ${filePath}`, key, { cause: error });
    }

    this.logger.debug({ key, path: filePath, bytes: data.length }, 'cache file written');
  }

  protected async removeFile(filePath: string): Promise<void> {
    if (this.forever) {
      return;
    }
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }
}

/**
 * Filesystem store keeping each entry, body included, in one file.
 * Bodies are held in memory while reading and writing.
 */
export class FileCacheStore extends BaseFileCacheStore implements UnifiedCacheStore {
  readonly kind = 'unified';

  async get(key: string): Promise<Buffer | null> {
    return this.readFile(this.pathFor(key));
  }

  async set(key: string, value: Buffer): Promise<void> {
    await this.writeFile(key, this.pathFor(key), value);
  }

  async delete(key: string): Promise<void> {
    await this.removeFile(this.pathFor(key));
  }
}

/**
 * Filesystem store keeping bodies in a sibling `.body` file, read back as
 * a stream.
 */
export class SeparateBodyFileCacheStore
  extends BaseFileCacheStore
  implements SeparateBodyCacheStore
{
  readonly kind = 'separate-body';

  async getMetadata(key: string): Promise<Buffer | null> {
    return this.readFile(this.pathFor(key));
  }

  async setMetadata(key: string, value: Buffer): Promise<void> {
    await this.writeFile(key, this.pathFor(key), value);
  }

  async getBody(key: string): Promise<Readable | null> {
    const bodyPath = this.pathFor(key) + BODY_SUFFIX;
    let fd: number;
    try {
      fd = await fs.open(bodyPath, 'r');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
    return fs.createReadStream(bodyPath, { fd });
  }

  async setBody(key: string, body: Buffer): Promise<void> {
    await this.writeFile(key, this.pathFor(key) + BODY_SUFFIX, body);
  }

  async delete(key: string): Promise<void> {
    const filePath = this.pathFor(key);
    await this.removeFile(filePath);
    await this.removeFile(filePath + BODY_SUFFIX);
  }
}

/**
 * Path of the cache file for a URL. The file may not exist.
 */
export function urlToFilePath(
  url: string,
  store: FileCacheStore | SeparateBodyFileCacheStore,
  method: string = 'GET',
  keyDeriver: CacheKeyDeriver = deriveCacheKey
): string {
  return store.pathFor(keyDeriver(method, url));
}

export function createFileCacheStore(options: FileCacheStoreOptions): FileCacheStore {
  return new FileCacheStore(options);
}

export function createSeparateBodyFileCacheStore(
  options: FileCacheStoreOptions
): SeparateBodyFileCacheStore {
  return new SeparateBodyFileCacheStore(options);
}
