import fp from 'fastify-plugin';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { runMigrations } from '../db/migrate.js';
import * as schema from '../db/schema.js';
import { createSqliteGateway } from '../db/persistenceGateway.js';
import type { PersistenceGateway } from '../db/persistenceGateway.js';
import { seedDemoData } from '../db/seed.js';

// Type augmentation: makes fastify.db and fastify.gateway available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    db: BetterSQLite3Database<typeof schema> & { $client: Database.Database };
    gateway: PersistenceGateway;
  }
}

export default fp(
  async function dbPlugin(fastify) {
    const dbPath = fastify.config.databaseUrl;

    // Ensure parent directory exists
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    fastify.log.info({ dbPath }, 'Opening SQLite database');

    const sqlite = new Database(dbPath);

    // Enable WAL mode for better concurrent read performance
    sqlite.pragma('journal_mode = WAL');
    // Cascade deletes down the hierarchy depend on enforced foreign keys
    sqlite.pragma('foreign_keys = ON');

    // Run pending migrations (throws on failure, preventing startup)
    const applied = runMigrations(sqlite);
    for (const file of applied) {
      fastify.log.info({ migration: file }, 'Applied migration');
    }
    fastify.log.info('Database migrations completed');

    // Create the Drizzle ORM instance wrapping the connection
    const db = drizzle(sqlite, { schema });
    const gateway = createSqliteGateway(db);

    if (fastify.config.seedDemoData) {
      const inserted = seedDemoData(gateway);
      fastify.log.info({ inserted }, 'Demo data seeding finished');
    }

    // Decorate the Fastify instance so all routes can access fastify.db and fastify.gateway
    fastify.decorate('db', db);
    fastify.decorate('gateway', gateway);

    // Close the connection on server shutdown
    fastify.addHook('onClose', () => {
      fastify.log.info('Closing SQLite database connection');
      sqlite.close();
    });
  },
  {
    name: 'db',
    dependencies: ['config'],
  },
);
