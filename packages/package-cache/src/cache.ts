import * as fs from "fs";
import * as path from "path";
import * as tar from "tar";
import { randomBytes } from "crypto";
import {
  IntegrityMismatchError,
  checkIntegrity,
  errnoCode,
  integrityToHex,
  logger as defaultLogger,
  primaryIntegrity,
  toFileSystemError,
} from "@burrow/common";
import type { Logger } from "@burrow/common";

export interface CacheKey {
  name: string;
  version: string;
  /**
   * SRI string or bare sha1 hex shasum the content must match.
   */
  integrity: string;
}

export interface CacheEntry {
  key: CacheKey;
  /**
   * Directory holding the extracted package.
   */
  dir: string;
}

export interface CacheStats {
  entries: number;
  bytes: number;
}

export interface EnsureResult {
  entry: CacheEntry;
  /**
   * The entry existed before the call.
   */
  hit: boolean;
}

const ENTRY_DIR = /^sha\d+-[0-9a-f]+$/;

function uniqueName(): string {
  return `${process.pid}-${randomBytes(6).toString("hex")}`;
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(dir)).isDirectory();
  } catch (e) {
    if (errnoCode(e) === "ENOENT") {
      return false;
    }
    throw toFileSystemError(e, dir, "stat");
  }
}

/**
 * Extracted packages shared by every project of the machine, addressed by
 * name, version and content digest:
 *
 *     <root>/packages/<name>/<version>/<algorithm>-<hex digest>/
 *
 * An entry only appears once its content was verified and fully extracted: it
 * is unpacked under `<root>/tmp` and renamed into place. When another writer
 * got there first its entry is kept.
 */
export class PackageCache {
  private readonly logger: Logger;
  private readonly pending = new Map<string, Promise<EnsureResult>>();

  constructor(
    readonly root: string,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  entryDir(key: CacheKey): string {
    const digest = primaryIntegrity(key.integrity);
    if (!digest) {
      throw new IntegrityMismatchError(
        key.name,
        key.version,
        key.integrity,
        "no supported digest"
      );
    }
    return path.join(
      this.root,
      "packages",
      key.name,
      key.version,
      `${digest.algorithm}-${integrityToHex(digest)}`
    );
  }

  async has(key: CacheKey): Promise<boolean> {
    return isDirectory(this.entryDir(key));
  }

  async lookup(key: CacheKey): Promise<CacheEntry | undefined> {
    const dir = this.entryDir(key);
    return (await isDirectory(dir)) ? { key, dir } : undefined;
  }

  /**
   * Verifies `bytes` against the key and extracts them into the cache.
   * Nothing is written when the digest does not match.
   */
  async store(key: CacheKey, bytes: Uint8Array): Promise<CacheEntry> {
    const dir = this.entryDir(key);
    const check = checkIntegrity(bytes, key.integrity);
    if (!check.ok) {
      throw new IntegrityMismatchError(
        key.name,
        key.version,
        key.integrity,
        check.actual
      );
    }
    if (await isDirectory(dir)) {
      return { key, dir };
    }

    const tmpRoot = path.join(this.root, "tmp");
    const work = path.join(tmpRoot, uniqueName());
    const archive = `${work}.tgz`;
    try {
      await fs.promises.mkdir(work, { recursive: true });
      await fs.promises.writeFile(archive, bytes);
      await tar.x({ file: archive, cwd: work, strip: 1 });
      await fs.promises.mkdir(path.dirname(dir), { recursive: true });
      try {
        await fs.promises.rename(work, dir);
      } catch (e) {
        if (!(await isDirectory(dir))) {
          throw e;
        }
        this.logger.debug(`${key.name}@${key.version} was cached concurrently`);
      }
    } catch (e) {
      throw toFileSystemError(e, dir, "extract into");
    } finally {
      await Promise.all([
        fs.promises.rm(work, { recursive: true, force: true }),
        fs.promises.rm(archive, { force: true }),
      ]);
    }
    return { key, dir };
  }

  /**
   * Returns the entry for `key`, downloading it with `fetch` when missing.
   * Concurrent calls for the same key share one download.
   */
  ensure(key: CacheKey, fetch: () => Promise<Uint8Array>): Promise<EnsureResult> {
    const dir = this.entryDir(key);
    let pending = this.pending.get(dir);
    if (!pending) {
      pending = (async () => {
        const existing = await this.lookup(key);
        if (existing) {
          return { entry: existing, hit: true };
        }
        return { entry: await this.store(key, await fetch()), hit: false };
      })().finally(() => this.pending.delete(dir));
      this.pending.set(dir, pending);
    }
    return pending;
  }

  async clear(): Promise<void> {
    for (const dir of ["packages", "tmp"]) {
      const target = path.join(this.root, dir);
      try {
        await fs.promises.rm(target, { recursive: true, force: true });
      } catch (e) {
        throw toFileSystemError(e, target, "remove");
      }
    }
  }

  async stats(): Promise<CacheStats> {
    const stats: CacheStats = { entries: 0, bytes: 0 };
    const walk = async (dir: string, inEntry: boolean): Promise<void> => {
      let children: fs.Dirent[];
      try {
        children = await fs.promises.readdir(dir, { withFileTypes: true });
      } catch (e) {
        if (errnoCode(e) === "ENOENT") {
          return;
        }
        throw toFileSystemError(e, dir, "read");
      }
      for (const child of children) {
        const childPath = path.join(dir, child.name);
        if (child.isDirectory()) {
          const isEntry = !inEntry && ENTRY_DIR.test(child.name);
          if (isEntry) {
            stats.entries++;
          }
          await walk(childPath, inEntry || isEntry);
        } else if (inEntry && child.isFile()) {
          stats.bytes += (await fs.promises.stat(childPath)).size;
        }
      }
    };
    await walk(path.join(this.root, "packages"), false);
    return stats;
  }
}
