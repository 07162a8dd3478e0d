import { REST, Routes } from 'discord.js';
import { loadCatalog } from './catalog.js';
import { loadCommands } from './commands/index.js';
import { loadConfig } from './config.js';
import { Database } from './services/database.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Deploy');

async function deployCommands(): Promise<void> {
  const config = loadConfig();
  const db = new Database(':memory:');
  const commands = loadCommands(db, loadCatalog(config.catalogPath));

  const commandData = commands.map(c => c.data.toJSON());

  const rest = new REST().setToken(config.discord.token);

  try {
    log.info(`Deploying ${commandData.length} commands...`);

    if (config.discord.guildId) {
      await rest.put(
        Routes.applicationGuildCommands(config.discord.clientId, config.discord.guildId),
        { body: commandData }
      );
      log.info(`Commands deployed to guild ${config.discord.guildId}`);
    } else {
      await rest.put(
        Routes.applicationCommands(config.discord.clientId),
        { body: commandData }
      );
      log.info('Commands deployed globally (may take up to 1 hour to propagate)');
    }
  } finally {
    db.close();
  }
}

deployCommands().catch((error: unknown) => {
  log.error('Failed to deploy commands:', error);
  process.exit(1);
});
