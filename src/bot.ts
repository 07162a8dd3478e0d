import { Client, GatewayIntentBits, Events, Collection, Partials } from 'discord.js';
import type { ChatInputCommandInteraction, AutocompleteInteraction, Message } from 'discord.js';
import type { Catalog } from './catalog.js';
import { formatSubscriptionList } from './commands/alert.js';
import type { Database } from './services/database.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Bot');

export interface Command {
  data: {
    name: string;
    description: string;
    toJSON(): unknown;
  };
  execute(interaction: ChatInputCommandInteraction): Promise<void>;
  autocomplete?(interaction: AutocompleteInteraction): Promise<void>;
}

export interface BotClient extends Client {
  commands: Collection<string, Command>;
}

export function createClient(): BotClient {
  const client: BotClient = Object.assign(
    new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.DirectMessages],
      partials: [Partials.Channel],
    }),
    { commands: new Collection<string, Command>() }
  );

  client.on(Events.InteractionCreate, async (interaction) => {
    if (interaction.isAutocomplete()) {
      const command = client.commands.get(interaction.commandName);
      if (command?.autocomplete) {
        try {
          await command.autocomplete(interaction);
        } catch (error) {
          log.error('Autocomplete error:', error);
        }
      }
      return;
    }

    if (!interaction.isChatInputCommand()) return;

    const command = client.commands.get(interaction.commandName);
    if (!command) {
      log.error(`Unknown command: ${interaction.commandName}`);
      return;
    }

    try {
      await command.execute(interaction);
    } catch (error) {
      log.error(`Command /${interaction.commandName} failed:`, error);
      const reply = { content: 'An error occurred. Please try again later.', ephemeral: true };
      try {
        if (interaction.replied || interaction.deferred) {
          await interaction.followUp(reply);
        } else {
          await interaction.reply(reply);
        }
      } catch (replyError) {
        log.error('Could not send error reply:', replyError);
      }
    }
  });

  return client;
}

export const HELP_TEXT =
  '**Available commands:**\n' +
  '• `subscribe <product-id>` - Get a DM when it is back in stock\n' +
  '• `unsubscribe <product-id>` - Stop watching a product\n' +
  '• `list` - View your alerts\n\n' +
  'Or use `/alert`, `/products` and `/stock`.';

export interface DirectMessage {
  content: string;
  author: { id: string };
  reply(content: string): Promise<unknown>;
}

/** Plain-text commands sent to the bot by DM. */
export async function handleDirectMessage(
  message: DirectMessage,
  db: Database,
  catalog: Catalog
): Promise<void> {
  const [command = '', productId] = message.content.trim().split(/\s+/);
  const chatId = message.author.id;

  switch (command.toLowerCase()) {
    case 'subscribe':
    case 'watch': {
      const product = productId ? catalog.get(productId) : undefined;
      if (!product) {
        await message.reply('Please give a valid product id. Example: `subscribe whey-chocolate-32`');
        return;
      }
      const added = db.subscribe(chatId, product.id);
      await message.reply(added
        ? `✅ Watching **${product.name}**`
        : `⚠️ You are already watching **${product.name}**`);
      return;
    }
    case 'unsubscribe':
    case 'unwatch': {
      if (!productId) {
        await message.reply('Please give a product id. Example: `unsubscribe whey-chocolate-32`');
        return;
      }
      const name = catalog.get(productId)?.name ?? productId;
      const removed = db.unsubscribe(chatId, productId);
      await message.reply(removed ? `✅ Stopped watching **${name}**` : `⚠️ You are not watching **${name}**`);
      return;
    }
    case 'list':
    case 'subscriptions':
      await message.reply(formatSubscriptionList(db, catalog, chatId) ?? 'You are not watching any products.');
      return;
    case 'help':
    case 'start':
    case '':
      await message.reply(HELP_TEXT);
      return;
    default:
      await message.reply("I didn't understand that. Send `help` for commands.");
  }
}

export function setupMessageHandler(client: BotClient, db: Database, catalog: Catalog): void {
  client.on(Events.MessageCreate, async (message: Message) => {
    if (message.author.bot || message.guild) return;

    try {
      await handleDirectMessage(message, db, catalog);
    } catch (error) {
      log.error('Message handler error:', error);
      await message.reply('An error occurred processing your request.').catch((replyError: unknown) => {
        log.error('Could not send error reply:', replyError);
      });
    }
  });
}
