import { EventEmitter } from 'node:events';
import PQueue from 'p-queue';
import type { CatalogAdapter, ShopIdentity } from '../adapters/base.adapter';
import { menuConfig } from '../config/menu';
import type { MenuCategory, MenuSyncState } from '../types/menuContracts';
import { describeError } from '../utils/errors';
import { menuLogger } from '../utils/logger';
import type { ServiceLogger } from '../utils/logger';
import type { MenuDiskCache } from './menuDiskCache';

export type BoundShop = ShopIdentity & {
  adapter: CatalogAdapter;
};

export type MenuChangeListener = (shopId: string, snapshot: MenuSyncState) => void;

type MenuSynchronizerOptions = {
  diskCache: MenuDiskCache;
  logger?: ServiceLogger;
  refreshConcurrency?: number;
};

const EMPTY_STATE: MenuSyncState = Object.freeze({
  categories: Object.freeze([]),
  isLoading: false,
  errorMessage: null,
});

const CHANGE_EVENT = 'change';

export class MenuSynchronizer extends EventEmitter {
  private readonly states = new Map<string, MenuSyncState>();
  private readonly pendingRefreshes = new Set<string>();
  private readonly queue: PQueue;
  private readonly diskCache: MenuDiskCache;
  private readonly log: ServiceLogger;

  constructor(options: MenuSynchronizerOptions) {
    super();
    this.diskCache = options.diskCache;
    this.log = options.logger ?? menuLogger;
    this.queue = new PQueue({ concurrency: options.refreshConcurrency ?? menuConfig.refreshConcurrency });
  }

  async primeMenu(shop: BoundShop): Promise<void> {
    if (this.getMenuCategories(shop.id).length > 0) {
      this.scheduleRefresh(shop);
      return;
    }

    const cached = await this.diskCache.load(shop.id);
    if (cached) {
      this.commit(shop.id, { categories: cached.categories, isLoading: false, errorMessage: null });
      if (this.diskCache.isStale(cached)) {
        this.scheduleRefresh(shop);
      }
      return;
    }

    await this.fetchMenuData(shop);
  }

  async fetchMenuData(shop: BoundShop): Promise<void> {
    this.commit(shop.id, { isLoading: true, errorMessage: null });

    let categories: MenuCategory[];
    try {
      categories = await shop.adapter.fetchMenu(shop);
    } catch (error) {
      this.log.warn({ shopId: shop.id, err: describeError(error) }, 'menu fetch failed');
      this.commit(shop.id, { isLoading: false, errorMessage: describeError(error) });
      return;
    }

    this.commit(shop.id, { categories, isLoading: false });
    await this.persist(shop.id, categories);
  }

  refreshMenuData(shop: BoundShop): Promise<void> {
    return this.fetchMenuData(shop);
  }

  getMenuCategories(shopId: string): readonly MenuCategory[] {
    return this.getSnapshot(shopId).categories;
  }

  isLoading(shopId: string): boolean {
    return this.getSnapshot(shopId).isLoading;
  }

  getErrorMessage(shopId: string): string | null {
    return this.getSnapshot(shopId).errorMessage;
  }

  getSnapshot(shopId: string): MenuSyncState {
    return this.states.get(shopId) ?? EMPTY_STATE;
  }

  clearError(shopId: string): void {
    if (this.getErrorMessage(shopId) !== null) {
      this.commit(shopId, { errorMessage: null });
    }
  }

  onChange(listener: MenuChangeListener): () => void {
    this.on(CHANGE_EVENT, listener);
    return () => {
      this.off(CHANGE_EVENT, listener);
    };
  }

  async whenIdle(): Promise<void> {
    await this.queue.onIdle();
  }

  get pendingRefreshCount(): number {
    return this.pendingRefreshes.size;
  }

  private scheduleRefresh(shop: BoundShop): void {
    if (this.pendingRefreshes.has(shop.id)) {
      return;
    }

    this.pendingRefreshes.add(shop.id);
    void this.queue
      .add(() => this.refreshSilently(shop))
      .catch((error: unknown) => {
        this.log.error({ shopId: shop.id, err: describeError(error) }, 'menu refresh task failed');
      })
      .finally(() => {
        this.pendingRefreshes.delete(shop.id);
      });
  }

  private async refreshSilently(shop: BoundShop): Promise<void> {
    let categories: MenuCategory[];
    try {
      categories = await shop.adapter.fetchMenu(shop);
    } catch (error) {
      this.log.warn({ shopId: shop.id, err: describeError(error) }, 'background menu refresh failed');
      return;
    }

    this.commit(shop.id, { categories, isLoading: false, errorMessage: null });
    await this.persist(shop.id, categories);
  }

  private async persist(shopId: string, categories: readonly MenuCategory[]): Promise<void> {
    try {
      await this.diskCache.save(shopId, categories);
    } catch (error) {
      this.log.warn({ shopId, err: describeError(error) }, 'menu cache write failed');
    }
  }

  private commit(shopId: string, patch: Partial<MenuSyncState>): void {
    const next: MenuSyncState = Object.freeze({ ...this.getSnapshot(shopId), ...patch });
    this.states.set(shopId, next);
    this.emit(CHANGE_EVENT, shopId, next);
  }
}
