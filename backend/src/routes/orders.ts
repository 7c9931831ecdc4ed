import { FastifyInstance } from 'fastify';
import { OrderStatusParamsSchema, OrderStatusQuerySchema } from '../types/orderContracts';

const registerOrderRoutes = async (fastify: FastifyInstance): Promise<void> => {
  fastify.get('/api/orders/:orderId/status', async (request, reply) => {
    const { orderId } = OrderStatusParamsSchema.parse(request.params);
    const { merchantId, posType } = OrderStatusQuerySchema.parse(request.query);

    const status = await fastify.catalogAdapters[posType].fetchOrderStatus(orderId, merchantId);

    return reply.send({ orderId, posType, status });
  });

  fastify.post('/api/orders/reconcile', async (_request, reply) => {
    const summary = await fastify.orderReconciler.reconcile();
    return reply.send(summary);
  });
};

export default registerOrderRoutes;
