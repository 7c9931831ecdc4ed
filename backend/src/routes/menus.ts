import { FastifyInstance } from 'fastify';
import { POS_DISPLAY_NAMES, ShopParamsSchema } from '../types/shopContracts';
import type { MenuSyncState } from '../types/menuContracts';

const toMenuResponse = (shopId: string, snapshot: MenuSyncState) => ({
  shopId,
  categories: snapshot.categories,
  isLoading: snapshot.isLoading,
  errorMessage: snapshot.errorMessage,
});

const registerMenuRoutes = async (fastify: FastifyInstance): Promise<void> => {
  fastify.get('/api/shops', async (_request, reply) => {
    const shops = fastify.shopDirectory.list().map((shop) => ({
      ...shop,
      posDisplayName: POS_DISPLAY_NAMES[shop.posType],
    }));

    return reply.send({ shops });
  });

  fastify.get('/api/shops/:shopId/menu', async (request, reply) => {
    const { shopId } = ShopParamsSchema.parse(request.params);
    const shop = fastify.shopDirectory.require(shopId);

    await fastify.menuSynchronizer.primeMenu(shop);

    return reply.send(toMenuResponse(shop.id, fastify.menuSynchronizer.getSnapshot(shop.id)));
  });

  fastify.post('/api/shops/:shopId/menu/refresh', async (request, reply) => {
    const { shopId } = ShopParamsSchema.parse(request.params);
    const shop = fastify.shopDirectory.require(shopId);

    await fastify.menuSynchronizer.refreshMenuData(shop);

    return reply.send(toMenuResponse(shop.id, fastify.menuSynchronizer.getSnapshot(shop.id)));
  });

  fastify.delete('/api/shops/:shopId/menu/error', async (request, reply) => {
    const { shopId } = ShopParamsSchema.parse(request.params);
    const shop = fastify.shopDirectory.require(shopId);

    fastify.menuSynchronizer.clearError(shop.id);

    return reply.status(204).send();
  });

  fastify.get('/api/shops/:shopId/hours', async (request, reply) => {
    const { shopId } = ShopParamsSchema.parse(request.params);
    const shop = fastify.shopDirectory.require(shopId);

    const businessHours = await shop.adapter.fetchBusinessHours(shop);

    return reply.send({ shopId: shop.id, businessHours });
  });
};

export default registerMenuRoutes;
