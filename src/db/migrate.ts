import fs from 'fs/promises';
import path from 'path';
import { Database } from './client.js';
import { validateEnv } from '../config/env.js';
import { configureLogger, logger } from '../config/logger.js';

const MIGRATIONS_DIR = path.join(__dirname, 'migrations');

interface Migration {
  id: number;
  name: string;
  executed_at: Date;
}

interface MigrationFile {
  id: number;
  name: string;
  filename: string;
}

export function parseMigrationFilenames(files: string[]): MigrationFile[] {
  return files
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((f) => {
      const match = f.match(/^(\d+)_(.+)\.sql$/);
      if (!match) throw new Error(`Invalid migration filename: ${f}`);
      return { id: parseInt(match[1], 10), name: match[2], filename: f };
    });
}

async function createMigrationsTable(db: Database) {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY,
      name VARCHAR(255) NOT NULL,
      executed_at TIMESTAMP DEFAULT NOW()
    );
  `);
}

async function getExecutedMigrations(db: Database): Promise<Migration[]> {
  const result = await db.query<Migration>('SELECT * FROM migrations ORDER BY id ASC');
  return result.rows;
}

async function executeMigration(db: Database, migration: MigrationFile, sql: string) {
  try {
    await db.transaction(async (client) => {
      await client.query(sql);
      await client.query('INSERT INTO migrations (id, name) VALUES ($1, $2)', [
        migration.id,
        migration.name,
      ]);
    });
    logger.info(`Migration ${migration.id}_${migration.name} executed successfully`);
  } catch (error) {
    logger.error(`Migration ${migration.id}_${migration.name} failed`, { error });
    throw error;
  }
}

export async function runMigrations(db: Database, dir = MIGRATIONS_DIR): Promise<number> {
  logger.info('Starting database migrations');

  await createMigrationsTable(db);

  const executed = await getExecutedMigrations(db);
  const executedIds = new Set(executed.map((m) => m.id));
  const migrations = parseMigrationFilenames(await fs.readdir(dir));

  let applied = 0;
  for (const migration of migrations) {
    if (executedIds.has(migration.id)) {
      logger.debug(`Skipping migration ${migration.id}_${migration.name} (already executed)`);
      continue;
    }

    const sql = await fs.readFile(path.join(dir, migration.filename), 'utf-8');
    await executeMigration(db, migration, sql);
    applied++;
  }

  logger.info('All migrations completed successfully', { applied });
  return applied;
}

if (require.main === module) {
  const env = validateEnv();
  configureLogger({ level: env.LOG_LEVEL, format: env.LOG_FORMAT });
  const db = new Database({ connectionString: env.DATABASE_URL });

  runMigrations(db)
    .finally(() => db.disconnect())
    .catch((error) => {
      logger.error('Fatal migration error', { error });
      process.exit(1);
    });
}
