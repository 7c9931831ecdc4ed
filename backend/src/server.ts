import 'dotenv/config';
import Fastify from 'fastify';
import { ZodError } from 'zod';
import { env } from './config/env';
import menuSyncPlugin from './plugins/menuSync';
import type { MenuSyncPluginOptions } from './plugins/menuSync';
import registerHealthRoutes from './routes/health';
import registerMenuRoutes from './routes/menus';
import registerOrderRoutes from './routes/orders';
import { MalformedResponseError } from './utils/errors';
import { loggerOptions } from './utils/logger';

export type BuildServerOptions = MenuSyncPluginOptions & {
  logger?: boolean;
};

export const buildServer = (options: BuildServerOptions = {}) => {
  const { logger, ...menuSyncOptions } = options;
  const fastify = Fastify({
    logger: logger === false ? false : loggerOptions,
  });

  fastify.register(menuSyncPlugin, menuSyncOptions);

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      reply.status(400).send({
        message: 'Validation failed',
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
      return;
    }

    if (error instanceof MalformedResponseError) {
      request.log.error({ err: error, issues: error.issues }, 'Malformed upstream response');
    }

    if ('statusCode' in error && typeof error.statusCode === 'number') {
      if (error.statusCode >= 500) {
        request.log.warn({ err: error }, 'Request failed');
      }
      reply.status(error.statusCode || 500).send({
        message: error.message,
      });
      return;
    }

    request.log.error({ err: error }, 'Unhandled error');
    reply.status(500).send({
      message: 'Internal Server Error',
    });
  });

  fastify.register(registerHealthRoutes);
  fastify.register(registerMenuRoutes);
  fastify.register(registerOrderRoutes);

  return fastify;
};

const start = async () => {
  const server = buildServer();

  try {
    await server.listen({ port: env.PORT, host: '0.0.0.0' });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
};

if (env.NODE_ENV !== 'test') {
  void start();
}
