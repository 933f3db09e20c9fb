import Fastify from 'fastify';
import type { FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { registerRoutes } from './routes';
import type { AppConfig } from './config/env';
import type { ItemStore } from './services/item-store';
import type { FileSink } from './services/file-sink';
import type { DatabaseProbe } from './services/diagnostics';

declare module 'fastify' {
  interface FastifyRequest {
    startTime?: bigint;
  }
}

export interface AppDeps {
  config: AppConfig;
  itemStore: ItemStore;
  fileSink: FileSink;
  databaseProbe?: DatabaseProbe;
}

export async function buildApp(deps: AppDeps, logger: FastifyServerOptions['logger'] = true) {
  const app = Fastify({ logger, trustProxy: true });

  // Request/response tracing for observability
  app.addHook('onRequest', async (req) => {
    req.startTime = process.hrtime.bigint();
    req.log.info({ reqId: req.id, method: req.method, url: req.url, ip: req.ip }, 'incoming request');
  });

  app.addHook('onResponse', async (req, reply) => {
    const start = req.startTime;
    const durationMs = start ? Number(process.hrtime.bigint() - start) / 1_000_000 : undefined;
    req.log.info({ reqId: req.id, statusCode: reply.statusCode, durationMs }, 'request completed');
  });

  app.addHook('onSend', async (req, reply) => {
    reply.header('x-request-id', req.id);
  });

  app.addHook('onError', async (req, _reply, err) => {
    req.log.error({ reqId: req.id, err }, 'unhandled error');
  });

  const { corsOrigins } = deps.config;
  await app.register(cors, {
    origin: corsOrigins.length > 0 ? corsOrigins : true,
    methods: ['GET', 'POST', 'OPTIONS'],
    credentials: true,
  });

  await app.register(multipart, {
    limits: { fileSize: deps.config.maxUploadBytes, files: deps.config.maxUploadFiles },
  });

  await registerRoutes(app, deps);
  return app;
}
