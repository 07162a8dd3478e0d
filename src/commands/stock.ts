import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import type { Catalog } from '../catalog.js';
import type { MonitorStatus } from '../monitors/index.js';
import type { Database } from '../services/database.js';
import { createStockEmbed } from '../utils/embed.js';

export function createStockCommand(
  db: Database,
  catalog: Catalog,
  getStatus: () => MonitorStatus | null
): Command {
  return {
    data: new SlashCommandBuilder()
      .setName('stock')
      .setDescription('Show the last known stock status of every product'),

    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const baseline = db.getBaseline();
      if (baseline.size === 0) {
        await interaction.reply({
          content: 'No stock data yet. The first check runs shortly after startup.',
          ephemeral: true,
        });
        return;
      }

      const embed = createStockEmbed(catalog, baseline, getStatus()?.nextCheckAt ?? null);
      await interaction.reply({ embeds: [embed] });
    },
  };
}
