import { buildApp } from './app';
import { config } from './config/env';
import { connectMongo } from './config/mongo';
import { mongoItemStore } from './services/item-store';
import { createDiskFileSink, ensureUploadDir } from './services/file-sink';
import { mongoDatabaseProbe } from './services/diagnostics';

async function start() {
  await ensureUploadDir(config.uploadDir);
  const app = await buildApp({
    config,
    itemStore: mongoItemStore,
    fileSink: createDiskFileSink(config.uploadDir),
    databaseProbe: mongoDatabaseProbe,
  });

  // Keep serving without a database so /test can report the problem.
  if (!config.dbUrl) {
    app.log.warn('DATABASE_URL not set; item inserts will fail');
  } else {
    try {
      await connectMongo();
    } catch (err) {
      app.log.error({ err }, 'mongo connection failed');
    }
  }

  await app.listen({ port: config.port, host: '0.0.0.0' });
  app.log.info({ uploadDir: config.uploadDir }, `Master data barang backend listening on ${config.port}`);
}

start().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
