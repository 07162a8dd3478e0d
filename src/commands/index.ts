import type { Command } from '../bot.js';
import type { Catalog } from '../catalog.js';
import type { MonitorStatus } from '../monitors/index.js';
import type { Database } from '../services/database.js';
import { createAlertCommand } from './alert.js';
import { createProductsCommand } from './products.js';
import { createStatusCommand } from './status.js';
import { createStockCommand } from './stock.js';

export function loadCommands(
  db: Database,
  catalog: Catalog,
  getStatus: () => MonitorStatus | null = () => null
): Command[] {
  return [
    createAlertCommand(db, catalog),
    createStockCommand(db, catalog, getStatus),
    createProductsCommand(catalog),
    createStatusCommand(db, getStatus),
  ];
}
