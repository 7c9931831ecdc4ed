import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { AdapterRegistry } from '../adapters';
import { ShopSchema } from '../types/shopContracts';
import type { Shop } from '../types/shopContracts';
import { NotFoundError } from '../utils/errors';
import { menuLogger } from '../utils/logger';
import type { ServiceLogger } from '../utils/logger';
import type { BoundShop } from './menuSynchronizer';

const ShopFileSchema = z.array(z.unknown());

export const parseShops = (raw: unknown, log: ServiceLogger = menuLogger): Shop[] => {
  const entries = ShopFileSchema.parse(raw);
  const shops: Shop[] = [];
  const seen = new Set<string>();

  entries.forEach((entry, index) => {
    const parsed = ShopSchema.safeParse(entry);
    if (!parsed.success) {
      log.warn(
        { index, issues: parsed.error.issues.map((issue) => issue.message) },
        'skipping invalid shop entry',
      );
      return;
    }

    if (seen.has(parsed.data.id)) {
      log.warn({ index, shopId: parsed.data.id }, 'skipping duplicate shop id');
      return;
    }

    seen.add(parsed.data.id);
    shops.push(parsed.data);
  });

  return shops;
};

export class ShopDirectory {
  private readonly shops: Shop[];
  private readonly bound = new Map<string, BoundShop>();

  constructor(shops: Shop[], adapters: AdapterRegistry) {
    this.shops = shops;
    for (const shop of shops) {
      this.bound.set(shop.id, { ...shop, adapter: adapters[shop.posType] });
    }
  }

  list(): Shop[] {
    return [...this.shops];
  }

  find(shopId: string): BoundShop | null {
    return this.bound.get(shopId) ?? null;
  }

  require(shopId: string): BoundShop {
    const shop = this.find(shopId);
    if (!shop) {
      throw new NotFoundError(`Shop ${shopId} not found`);
    }
    return shop;
  }

  get size(): number {
    return this.shops.length;
  }
}

export const loadShopDirectory = async (
  filePath: string,
  adapters: AdapterRegistry,
  log: ServiceLogger = menuLogger,
): Promise<ShopDirectory> => {
  const raw: unknown = JSON.parse(await readFile(filePath, 'utf8'));
  const shops = parseShops(raw, log);
  log.info({ filePath, shops: shops.length }, 'shop directory loaded');
  return new ShopDirectory(shops, adapters);
};
