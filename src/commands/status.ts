import { SlashCommandBuilder, EmbedBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import type { MonitorStatus } from '../monitors/index.js';
import type { Database } from '../services/database.js';
import { discordTimestamp } from '../utils/embed.js';

export function describeLastCycle(status: MonitorStatus): string {
  const result = status.lastResult;
  if (!result) return 'No check has finished yet';

  switch (result.status) {
    case 'skipped':
      return `Skipped (${result.reason.replace(/_/g, ' ')})`;
    case 'fetch_failed':
      return `Stock API failed: ${result.error}`;
    case 'store_failed':
      return `Database failed: ${result.error}`;
    case 'completed': {
      const { report } = result;
      return [
        `${result.events.length} transitions across ${result.productsObserved} products`,
        `${report.sendsSucceeded}/${report.sendsAttempted} alerts delivered` +
          (report.sendsFailed > 0 ? `, ${report.sendsFailed} failed` : ''),
        result.persistFailures > 0 ? `${result.persistFailures} states not saved` : null,
      ]
        .filter((line): line is string => line !== null)
        .join('\n');
    }
  }
}

export function describeLastSkip(status: MonitorStatus): string | null {
  const skip = status.lastSkip;
  if (!skip) return null;
  return `${skip.reason.replace(/_/g, ' ')} ${discordTimestamp(skip.at, 'R')}`;
}

export function createStatusCommand(db: Database, getStatus: () => MonitorStatus | null): Command {
  return {
    data: new SlashCommandBuilder()
      .setName('status')
      .setDescription('Show monitor status and the result of the last check'),

    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const status = getStatus();
      const baseline = db.getBaseline();
      const availableCount = [...baseline.values()].filter(s => s.inStock).length;

      const embed = new EmbedBuilder()
        .setColor(0x0099ff)
        .setTitle('Restock Monitor Status')
        .setTimestamp()
        .addFields(
          { name: 'Products Tracked', value: String(baseline.size), inline: true },
          { name: 'In Stock', value: String(availableCount), inline: true },
          { name: 'Out of Stock', value: String(baseline.size - availableCount), inline: true }
        );

      if (!status) {
        embed.addFields({ name: 'Monitor', value: 'Not running', inline: false });
      } else {
        embed.addFields(
          { name: 'Phase', value: status.phase, inline: true },
          { name: 'Schedule', value: status.schedule, inline: true },
          {
            name: 'Next Check',
            value: status.nextCheckAt ? discordTimestamp(status.nextCheckAt, 'R') : 'Not scheduled',
            inline: true,
          },
          { name: 'Last Check', value: describeLastCycle(status), inline: false }
        );
        const lastSkip = describeLastSkip(status);
        if (lastSkip) {
          embed.addFields({ name: 'Last Skipped', value: lastSkip, inline: false });
        }
        if (status.lastCompletedAt) {
          embed.addFields({ name: 'Last Completed', value: discordTimestamp(status.lastCompletedAt), inline: false });
        }
      }

      await interaction.reply({ embeds: [embed], ephemeral: true });
    },
  };
}
