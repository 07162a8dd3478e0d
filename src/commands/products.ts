import { SlashCommandBuilder, EmbedBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import { CATEGORY_LABELS } from '../catalog.js';
import type { Catalog } from '../catalog.js';

export function createProductsCommand(catalog: Catalog): Command {
  return {
    data: new SlashCommandBuilder()
      .setName('products')
      .setDescription('List the products you can get alerts for'),

    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const embed = new EmbedBuilder()
        .setColor(0x0099ff)
        .setTitle('Product Catalog')
        .setDescription('Use `/alert add` with a product below to get a DM when it is back in stock.');

      for (const [category, products] of catalog.byCategory()) {
        const { label, emoji } = CATEGORY_LABELS[category];
        embed.addFields({
          name: `${emoji} ${label}`,
          value: products.map(p => `• ${p.name} (\`${p.id}\`)`).join('\n'),
        });
      }

      await interaction.reply({ embeds: [embed], ephemeral: true });
    },
  };
}
