import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { createDb } from './connection.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const DB_DIR = resolve(__dirname, '..', '..', 'db');

const db = createDb(config.database);

try {
  const [batch, applied] = await db.migrate.latest({
    directory: resolve(DB_DIR, 'migrations'),
    loadExtensions: ['.js'],
  });
  logger.info({ batch, applied }, 'Migrations applied');

  const [seeded] = await db.seed.run({
    directory: resolve(DB_DIR, 'seeds'),
    loadExtensions: ['.js'],
  });
  logger.info({ seeded }, 'Seeds run');
} catch (err) {
  logger.fatal({ err }, 'Migration failed');
  process.exitCode = 1;
} finally {
  await db.destroy();
}
