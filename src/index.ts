import { Events } from 'discord.js';
import fs from 'node:fs';
import path from 'node:path';
import { createClient, setupMessageHandler } from './bot.js';
import { loadCatalog } from './catalog.js';
import { loadCommands } from './commands/index.js';
import { loadConfig } from './config.js';
import { StockMonitor } from './monitors/index.js';
import { Database } from './services/database.js';
import { NotificationDispatcher } from './services/dispatcher.js';
import { createDiscordSender } from './services/notifier.js';
import { StockApi } from './services/stock-api.js';
import { createLogger, setLogLevel } from './utils/logger.js';
import { SchedulePolicy } from './utils/schedule.js';

const log = createLogger('Main');

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  log.info('Starting Restock Alert Bot...');

  const catalog = loadCatalog(config.catalogPath);
  log.info(`Loaded ${catalog.ids().size} products from catalog`);

  if (!fs.existsSync(config.dataDir)) {
    fs.mkdirSync(config.dataDir, { recursive: true });
  }

  const db = new Database(path.join(config.dataDir, 'bot.db'));
  log.info('Database initialized');

  const client = createClient();

  const dispatcher = new NotificationDispatcher({
    send: createDiscordSender(client, catalog),
    concurrency: config.delivery.sendConcurrency,
    rateLimitPerSecond: config.delivery.sendRateLimit,
    onDelivery: record => db.recordDelivery(record),
  });

  const monitor = new StockMonitor({
    api: new StockApi(config.stockApi),
    store: db,
    dispatcher,
    productIds: catalog.ids(),
    schedule: new SchedulePolicy({
      intervalSeconds: config.monitoring.pollIntervalSeconds,
      peakIntervalSeconds: config.monitoring.peakPollIntervalSeconds,
      peakHours: config.monitoring.peakHours,
      quietHours: config.monitoring.quietHours,
      timezone: config.monitoring.timezone,
    }),
  });

  const commands = loadCommands(db, catalog, () => monitor.getStatus());
  for (const command of commands) {
    client.commands.set(command.data.name, command);
  }
  setupMessageHandler(client, db, catalog);
  log.info(`Loaded ${commands.length} commands`);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down...`);

    try {
      await monitor.stop(config.monitoring.shutdownTimeoutMs);
    } catch (error) {
      log.error('Error stopping monitor:', error);
    }
    try {
      await client.destroy();
    } catch (error) {
      log.error('Error closing Discord client:', error);
    }
    db.close();
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  client.once(Events.ClientReady, (readyClient) => {
    log.info(`Logged in as ${readyClient.user.tag}`);
    monitor.start();
  });

  await client.login(config.discord.token);
}

main().catch((error: unknown) => {
  log.error('Fatal error:', error);
  process.exit(1);
});
