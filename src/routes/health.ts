import type { FastifyInstance } from 'fastify';
import { runDiagnostics } from '../services/diagnostics';
import type { DatabaseProbe, DiagnosticsEnv } from '../services/diagnostics';

export const ROOT_MESSAGE = 'Backend ready for Master Data Barang';

export async function healthRoutes(fastify: FastifyInstance, probe: DatabaseProbe | undefined, env: DiagnosticsEnv) {
  fastify.get('/', async () => ({ message: ROOT_MESSAGE }));

  // Check whether the database is available and accessible
  fastify.get('/test', async () => runDiagnostics(probe, env));
}
