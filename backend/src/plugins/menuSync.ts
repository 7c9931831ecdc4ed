import fp from 'fastify-plugin';
import { createAdapterRegistry } from '../adapters';
import type { AdapterRegistry } from '../adapters';
import { env } from '../config/env';
import { createCredentialBroker } from '../services/credentialBroker';
import type { CredentialBroker } from '../services/credentialBroker';
import { createMenuDiskCache } from '../services/menuDiskCache';
import type { MenuDiskCache } from '../services/menuDiskCache';
import { MenuSynchronizer } from '../services/menuSynchronizer';
import { JsonFileOrderStore } from '../services/orderStore';
import type { OrderStore } from '../services/orderStore';
import { OrderStatusReconciler } from '../services/orderStatusReconciler';
import { ShopDirectory, loadShopDirectory } from '../services/shopDirectory';
import type { Shop } from '../types/shopContracts';

declare module 'fastify' {
  interface FastifyInstance {
    credentialBroker: CredentialBroker;
    catalogAdapters: AdapterRegistry;
    shopDirectory: ShopDirectory;
    menuSynchronizer: MenuSynchronizer;
    orderStore: OrderStore;
    orderReconciler: OrderStatusReconciler;
  }
}

export type MenuSyncPluginOptions = {
  credentialBroker?: CredentialBroker;
  adapters?: AdapterRegistry;
  shops?: Shop[];
  diskCache?: MenuDiskCache;
  orderStore?: OrderStore;
};

const menuSyncPlugin = fp<MenuSyncPluginOptions>(
  async (fastify, opts) => {
    const broker =
      opts.credentialBroker ??
      createCredentialBroker({ logger: fastify.log.child({ module: 'credentials' }) });
    const adapters =
      opts.adapters ??
      createAdapterRegistry({ broker, logger: fastify.log.child({ module: 'catalog' }) });

    const shopDirectory = opts.shops
      ? new ShopDirectory(opts.shops, adapters)
      : await loadShopDirectory(env.SHOPS_FILE, adapters, fastify.log);

    const menuLog = fastify.log.child({ module: 'menu-sync' });
    const menuSynchronizer = new MenuSynchronizer({
      diskCache: opts.diskCache ?? createMenuDiskCache({ logger: menuLog }),
      logger: menuLog,
    });

    const orderStore = opts.orderStore ?? new JsonFileOrderStore(env.ORDERS_FILE);
    const orderReconciler = new OrderStatusReconciler({
      store: orderStore,
      adapters,
      logger: fastify.log.child({ module: 'orders' }),
    });

    fastify.decorate('credentialBroker', broker);
    fastify.decorate('catalogAdapters', adapters);
    fastify.decorate('shopDirectory', shopDirectory);
    fastify.decorate('menuSynchronizer', menuSynchronizer);
    fastify.decorate('orderStore', orderStore);
    fastify.decorate('orderReconciler', orderReconciler);

    fastify.addHook('onClose', async () => {
      await menuSynchronizer.whenIdle();
      menuSynchronizer.removeAllListeners();
      broker.clear();
    });
  },
  {
    name: 'menu-sync',
  },
);

export default menuSyncPlugin;
