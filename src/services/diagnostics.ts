import mongoose from 'mongoose';

const MAX_COLLECTIONS = 10;
const MAX_ERROR_CHARS = 50;

export interface DatabaseHandle {
  listCollectionNames(): Promise<string[]>;
}

export interface DatabaseProbe {
  /** Returns null while the datastore is not initialized. */
  getHandle(): DatabaseHandle | null;
}

export interface DiagnosticsEnv {
  databaseUrl: string;
  databaseName: string;
}

export interface DiagnosticsReport {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

// Counted in code points so a surrogate pair is never split.
const shortMessage = (err: unknown) =>
  Array.from(err instanceof Error ? err.message : String(err))
    .slice(0, MAX_ERROR_CHARS)
    .join('');

export const mongoDatabaseProbe: DatabaseProbe = {
  getHandle() {
    const conn = mongoose.connection;
    const db = conn.db;
    if (conn.readyState !== 1 || !db) return null;
    return {
      async listCollectionNames() {
        const collections = await db.listCollections({}, { nameOnly: true }).toArray();
        return collections.map((c) => c.name);
      },
    };
  },
};

export async function runDiagnostics(probe: DatabaseProbe | undefined, env: DiagnosticsEnv): Promise<DiagnosticsReport> {
  const report: DiagnosticsReport = {
    backend: '✅ Running',
    database: '❌ Not Available',
    database_url: env.databaseUrl ? '✅ Set' : '❌ Not Set',
    database_name: env.databaseName ? '✅ Set' : '❌ Not Set',
    connection_status: 'Not Connected',
    collections: [],
  };

  if (!probe) {
    report.database = '❌ Database module not found (run enable-database first)';
    return report;
  }

  let handle: DatabaseHandle | null;
  try {
    handle = probe.getHandle();
  } catch (err) {
    report.database = `❌ Error: ${shortMessage(err)}`;
    return report;
  }

  if (!handle) {
    report.database = '⚠️  Available but not initialized';
    return report;
  }

  report.database = '✅ Available';
  report.connection_status = 'Connected';
  try {
    const names = await handle.listCollectionNames();
    report.collections = names.slice(0, MAX_COLLECTIONS);
    report.database = '✅ Connected & Working';
  } catch (err) {
    report.database = `⚠️  Connected but Error: ${shortMessage(err)}`;
  }
  return report;
}
