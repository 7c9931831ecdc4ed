import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { menuConfig } from '../config/menu';
import { CachedMenuSchema } from '../types/menuContracts';
import type { CachedMenu, MenuCategory } from '../types/menuContracts';
import { systemClock } from '../utils/cache';
import type { Clock } from '../utils/cache';
import { describeError } from '../utils/errors';
import { menuLogger } from '../utils/logger';
import type { ServiceLogger } from '../utils/logger';

type MenuDiskCacheOptions = {
  directory: string;
  ttlSeconds: number;
  clock?: Clock;
  logger?: ServiceLogger;
};

const FILE_PREFIX = menuConfig.cacheFilePrefix;
const FILE_SUFFIX = '.json';

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export class MenuDiskCache {
  private readonly directory: string;
  private readonly ttlSeconds: number;
  private readonly clock: Clock;
  private readonly log: ServiceLogger;

  constructor(options: MenuDiskCacheOptions) {
    this.directory = options.directory;
    this.ttlSeconds = options.ttlSeconds;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? menuLogger;
  }

  filePathFor(shopId: string): string {
    return path.join(this.directory, `${FILE_PREFIX}${encodeURIComponent(shopId)}${FILE_SUFFIX}`);
  }

  async load(shopId: string): Promise<CachedMenu | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePathFor(shopId), 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.log.warn({ shopId, err: describeError(error) }, 'menu cache unreadable');
      }
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.log.warn({ shopId, err: describeError(error) }, 'menu cache is not valid JSON');
      return null;
    }

    const parsed = CachedMenuSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn({ shopId, issues: parsed.error.issues.length }, 'menu cache has unexpected shape');
      return null;
    }

    return parsed.data;
  }

  async save(shopId: string, categories: readonly MenuCategory[]): Promise<CachedMenu> {
    const entry: CachedMenu = {
      categories: [...categories],
      timestamp: Math.floor(this.clock() / 1000),
    };

    const target = this.filePathFor(shopId);
    const temp = `${target}.${randomUUID()}.tmp`;

    await mkdir(this.directory, { recursive: true });
    try {
      await writeFile(temp, JSON.stringify(entry), 'utf8');
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }

    return entry;
  }

  isStale(entry: CachedMenu): boolean {
    return Math.floor(this.clock() / 1000) - entry.timestamp > this.ttlSeconds;
  }
}
