/**
 * Import Catalog Command
 *
 * Loads a catalog CSV file into the database. Rows whose show_id already
 * exists are skipped.
 *
 * Usage:
 *   npm run import:catalog
 *   npm run import:catalog -- data/catalog.csv
 */

import { validateEnv } from '../config/env.js';
import { configureLogger, logger } from '../config/logger.js';
import { createServices } from '../app.js';
import { Database } from '../db/client.js';
import { PgContentStore } from '../db/content.store.js';
import { PgUserStore } from '../db/user.store.js';

async function main() {
  const env = validateEnv();
  configureLogger({ level: env.LOG_LEVEL, format: env.LOG_FORMAT });

  const csvPath = process.argv[2] ?? env.DEFAULT_CSV_PATH;
  const db = new Database({ connectionString: env.DATABASE_URL, max: 2 });

  console.log('='.repeat(60));
  console.log('IMPORT CATALOG');
  console.log('='.repeat(60));
  console.log(`File: ${csvPath}`);

  try {
    const { importer } = createServices(
      { content: new PgContentStore(db), users: new PgUserStore(db) },
      env
    );
    const result = await importer.importFile(csvPath);

    console.log(`\nProcessed: ${result.records_processed}`);
    console.log(`Inserted:  ${result.records_inserted}`);
    console.log(`Skipped:   ${result.records_skipped}`);
    console.log(`\nCatalog now holds ${result.statistics.total_content} records`);
    console.log(`  Movies:   ${result.statistics.movies}`);
    console.log(`  TV shows: ${result.statistics.tv_shows}`);
  } finally {
    await db.disconnect();
  }
}

main().catch((error) => {
  logger.error('Catalog import failed', { error });
  process.exit(1);
});
