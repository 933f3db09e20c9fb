import type { FastifyInstance } from 'fastify';
import { healthRoutes } from './health';
import { itemRoutes } from './items.routes';
import type { AppDeps } from '../app';

export async function registerRoutes(app: FastifyInstance, deps: AppDeps) {
  const { config } = deps;
  await healthRoutes(app, deps.databaseProbe, { databaseUrl: config.dbUrl, databaseName: config.dbName });

  // Item API lives under /api
  await app.register(
    async (instance) => {
      await itemRoutes(instance, {
        itemStore: deps.itemStore,
        fileSink: deps.fileSink,
        uploadPublicPrefix: config.uploadPublicPrefix,
      });
    },
    { prefix: '/api' },
  );
}
