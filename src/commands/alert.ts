import { SlashCommandBuilder } from 'discord.js';
import type { AutocompleteInteraction, ChatInputCommandInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import type { Catalog } from '../catalog.js';
import type { Database } from '../services/database.js';
import { discordTimestamp, formatPrice, formatStockLabel } from '../utils/embed.js';

export function createAlertCommand(db: Database, catalog: Catalog): Command {
  const data = new SlashCommandBuilder()
    .setName('alert')
    .setDescription('Manage back-in-stock alerts')
    .addSubcommand(sub =>
      sub
        .setName('add')
        .setDescription('Get a DM when a product comes back in stock')
        .addStringOption(opt =>
          opt
            .setName('product')
            .setDescription('Product to watch')
            .setRequired(true)
            .setAutocomplete(true)
        )
    )
    .addSubcommand(sub =>
      sub
        .setName('remove')
        .setDescription('Stop watching a product')
        .addStringOption(opt =>
          opt
            .setName('product')
            .setDescription('Product to stop watching')
            .setRequired(true)
            .setAutocomplete(true)
        )
    )
    .addSubcommand(sub =>
      sub
        .setName('list')
        .setDescription('List the products you are watching')
    );

  return {
    data,
    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const subcommand = interaction.options.getSubcommand();

      switch (subcommand) {
        case 'add':
          await handleAdd(interaction, db, catalog);
          break;
        case 'remove':
          await handleRemove(interaction, db, catalog);
          break;
        case 'list':
          await handleList(interaction, db, catalog);
          break;
      }
    },
    async autocomplete(interaction: AutocompleteInteraction): Promise<void> {
      const focused = interaction.options.getFocused();
      const matches = catalog.search(focused).map(p => ({
        name: p.name.slice(0, 100),
        value: p.id,
      }));
      await interaction.respond(matches);
    },
  };
}

async function handleAdd(
  interaction: ChatInputCommandInteraction,
  db: Database,
  catalog: Catalog
): Promise<void> {
  const productId = interaction.options.getString('product', true);
  const product = catalog.get(productId);

  if (!product) {
    await interaction.reply({
      content: `❌ Unknown product \`${productId}\`. Pick one from the suggestions or see \`/products\`.`,
      ephemeral: true,
    });
    return;
  }

  const added = db.subscribe(interaction.user.id, product.id);
  const state = db.getProductState(product.id);

  if (added) {
    await interaction.reply({
      content:
        `✅ Watching **${product.name}** (currently ${formatStockLabel(state?.inStock)}).\n` +
        'You will get a DM each time it comes back in stock.',
      ephemeral: true,
    });
  } else {
    await interaction.reply({
      content: `⚠️ You are already watching **${product.name}**.`,
      ephemeral: true,
    });
  }
}

async function handleRemove(
  interaction: ChatInputCommandInteraction,
  db: Database,
  catalog: Catalog
): Promise<void> {
  const productId = interaction.options.getString('product', true);
  const name = catalog.get(productId)?.name ?? productId;
  const removed = db.unsubscribe(interaction.user.id, productId);

  await interaction.reply({
    content: removed
      ? `✅ Stopped watching **${name}**`
      : `⚠️ You are not watching **${name}**`,
    ephemeral: true,
  });
}

export function formatSubscriptionList(db: Database, catalog: Catalog, chatId: string): string | null {
  const productIds = db.getSubscriptions(chatId);
  if (productIds.length === 0) return null;

  const lines = productIds.map(productId => {
    const name = catalog.get(productId)?.name ?? productId;
    const state = db.getProductState(productId);
    const last = db.getLastDelivery(chatId, productId);
    const notified = last ? `, last alert ${discordTimestamp(last.sentAt)}` : '';
    const price = formatPrice(state?.price ?? null);
    return `• **${name}** ${formatStockLabel(state?.inStock)}${price ? ` (${price})` : ''}${notified}`;
  });

  return `**Your alerts:**\n${lines.join('\n')}`;
}

async function handleList(
  interaction: ChatInputCommandInteraction,
  db: Database,
  catalog: Catalog
): Promise<void> {
  const list = formatSubscriptionList(db, catalog, interaction.user.id);

  await interaction.reply({
    content: list ?? 'You are not watching any products. Use `/alert add` to start.',
    ephemeral: true,
  });
}
