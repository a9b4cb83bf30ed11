/**
 * Applies pending schema migrations and exits.
 * Run with: npm run migrate
 */
import 'dotenv/config';
import { loadDatabaseConfig } from '../src/config/index.js';
import { ConnectionPool, resolveDatabasePath } from '../src/persistence/database.js';
import { LATEST_SCHEMA_VERSION, migrations, runMigrations, verifySchema } from '../src/persistence/migrations.js';
import { createLogger, setLogLevel } from '../src/utils/logger.js';
import { exitCodeFor } from '../src/utils/errors.js';

const logger = createLogger({ component: 'migrate' });

function main(): void {
  const config = loadDatabaseConfig();
  setLogLevel(config.logLevel);

  const pool = new ConnectionPool({
    path: resolveDatabasePath(config.databaseUrl),
    maxSize: 1,
    idleTimeoutMs: config.dbIdleTimeoutMs,
  });
  try {
    const applied = pool.use((db) => {
      const versions = runMigrations(db, migrations);
      verifySchema(db, migrations);
      return versions;
    });
    logger.info({ applied, latest: LATEST_SCHEMA_VERSION }, 'Schema is current');
  } finally {
    pool.close();
  }
}

try {
  main();
} catch (error) {
  logger.fatal({ error }, 'Migration failed');
  process.exitCode = exitCodeFor(error);
}
