import { FastifyInstance } from 'fastify';

const registerHealthRoutes = async (fastify: FastifyInstance): Promise<void> => {
  fastify.get('/healthz', async () => ({ status: 'ok' }));

  fastify.get('/readyz', async (_request, reply) => {
    const shops = fastify.shopDirectory.size;
    if (shops === 0) {
      return reply.status(503).send({ status: 'unavailable', shops });
    }

    return reply.send({
      status: 'ready',
      shops,
      pendingMenuRefreshes: fastify.menuSynchronizer.pendingRefreshCount,
      cachedCredentials: fastify.credentialBroker.cachedCount,
    });
  });
};

export default registerHealthRoutes;
