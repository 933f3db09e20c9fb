import { connectMongo, disconnectMongo } from '../src/config/mongo';
import { config } from '../src/config/env';
import { mongoDatabaseProbe, runDiagnostics } from '../src/services/diagnostics';

async function main() {
  if (config.dbUrl) {
    try {
      await connectMongo();
    } catch (err) {
      console.error('Mongo connection failed:', err instanceof Error ? err.message : err);
    }
  }
  const report = await runDiagnostics(mongoDatabaseProbe, {
    databaseUrl: config.dbUrl,
    databaseName: config.dbName,
  });
  console.log(JSON.stringify(report, null, 2));
  await disconnectMongo();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
