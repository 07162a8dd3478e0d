import fs from 'node:fs';
import path from 'node:path';
import { Database } from '../services/database.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('InitDb');

function initDatabase(): void {
  const dataDir = process.env['DATA_DIR'] ?? './data';
  const dbPath = path.join(dataDir, 'bot.db');

  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
    log.info(`Created data directory: ${dataDir}`);
  }

  const db = new Database(dbPath);
  const baseline = db.getBaseline();
  log.info(`Database ready at ${dbPath} (${baseline.size} products with known state)`);
  db.close();
}

initDatabase();
