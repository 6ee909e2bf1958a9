import { mkdir, readFile, readdir, stat, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { digest } from './canonical.js';
import { CacheReadError, CacheWriteError } from './errors.js';
import defaultLogger, { type Logger } from './logger.js';

/**
 * Content-addressed store for stage outputs. `cacheType` partitions the key
 * space per stage; `key` is the canonical input string.
 *
 * Reads never throw: a missing or unreadable entry is a miss. Writes never
 * throw either, a lost write only costs a recomputation on the next run.
 */
export interface ContentCache {
  get(cacheType: string, key: string): Promise<unknown>;
  put(cacheType: string, key: string, document: unknown): Promise<void>;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileContentCache implements ContentCache {
  readonly rootDir: string;
  private readonly log: Logger;

  constructor(rootDir: string, log: Logger = defaultLogger) {
    this.rootDir = rootDir;
    this.log = log.child({ component: 'content-cache' });
  }

  /** `{root}/{cacheType}_{sha256}.json` */
  pathFor(cacheType: string, key: string): string {
    return path.join(this.rootDir, `${cacheType}_${digest(key)}.json`);
  }

  async get(cacheType: string, key: string): Promise<unknown> {
    const file = this.pathFor(cacheType, key);
    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (err) {
      if (isMissing(err)) {
        this.log.debug({ cacheType, file }, 'Cache miss');
        return undefined;
      }
      this.warnRead(new CacheReadError(file, err));
      return undefined;
    }

    try {
      const document: unknown = JSON.parse(text);
      this.log.debug({ cacheType, file }, 'Cache hit');
      return document;
    } catch (err) {
      this.warnRead(new CacheReadError(file, err));
      return undefined;
    }
  }

  async put(cacheType: string, key: string, document: unknown): Promise<void> {
    const file = this.pathFor(cacheType, key);
    try {
      await mkdir(this.rootDir, { recursive: true });
      await writeFile(file, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
      this.log.debug({ cacheType, file }, 'Cache write');
    } catch (err) {
      const error = new CacheWriteError(file, err);
      this.log.warn({ err: error, cause: String(err) }, error.message);
    }
  }

  /**
   * Parsed document of the most recently modified entry in a partition that
   * reads as JSON and passes `accept`. Unreadable or rejected entries fall
   * through to the next newest; undefined when none is left.
   */
  async findLatest(cacheType: string, accept: (document: unknown) => boolean = () => true): Promise<unknown> {
    const files = await this.listFiles(cacheType);
    const entries: { file: string; mtimeMs: number }[] = [];
    for (const file of files) {
      try {
        const { mtimeMs } = await stat(file);
        entries.push({ file, mtimeMs });
      } catch (err) {
        if (!isMissing(err)) throw err;
      }
    }
    entries.sort((a, b) => b.mtimeMs - a.mtimeMs);

    for (const { file } of entries) {
      let document: unknown;
      try {
        document = JSON.parse(await readFile(file, 'utf8'));
      } catch (err) {
        if (!isMissing(err)) this.warnRead(new CacheReadError(file, err));
        continue;
      }
      if (accept(document)) return document;
      this.log.debug({ cacheType, file }, 'Cache entry rejected; trying an older one');
    }
    return undefined;
  }

  /**
   * Removes every entry, or every entry of one partition. Returns the count.
   */
  async clear(cacheType?: string): Promise<number> {
    const files = await this.listFiles(cacheType);
    let removed = 0;
    for (const file of files) {
      try {
        await unlink(file);
        removed++;
      } catch (err) {
        if (!isMissing(err)) throw err;
      }
    }
    this.log.info({ cacheType: cacheType ?? '*', removed }, 'Cache cleared');
    return removed;
  }

  private async listFiles(cacheType?: string): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.rootDir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    const prefix = cacheType ? `${cacheType}_` : '';
    return names
      .filter(name => name.endsWith('.json') && name.startsWith(prefix))
      .filter(name => cacheType === undefined || isEntryOf(name, cacheType))
      .map(name => path.join(this.rootDir, name));
  }

  private warnRead(error: CacheReadError): void {
    this.log.warn({ err: error, cause: String(error.cause) }, `${error.message}; treating as a miss`);
  }
}

// `resume_<64 hex>.json` must not match a `resume_extra_<hex>.json` partition.
function isEntryOf(fileName: string, cacheType: string): boolean {
  const rest = fileName.slice(cacheType.length + 1, -'.json'.length);
  return /^[0-9a-f]{64}$/.test(rest);
}

/**
 * In-process cache with the same semantics; documents are stored as JSON text
 * so callers never share mutable references with the store.
 */
export class MemoryContentCache implements ContentCache {
  private readonly entries = new Map<string, string>();

  async get(cacheType: string, key: string): Promise<unknown> {
    const text = this.entries.get(`${cacheType}_${digest(key)}`);
    if (text === undefined) return undefined;
    const document: unknown = JSON.parse(text);
    return document;
  }

  async put(cacheType: string, key: string, document: unknown): Promise<void> {
    this.entries.set(`${cacheType}_${digest(key)}`, JSON.stringify(document));
  }

  get size(): number {
    return this.entries.size;
  }
}
