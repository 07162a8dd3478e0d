import { EmbedBuilder } from 'discord.js';
import { CATEGORY_LABELS } from '../catalog.js';
import type { Catalog } from '../catalog.js';
import type { LastKnownState, Product, TransitionEvent } from '../types.js';

const FOOTER = 'Restock Monitor';

export function formatStockLabel(inStock: boolean | undefined): string {
  if (inStock === undefined) return '⚪ Unknown';
  return inStock ? '🟢 In Stock' : '🔴 Out of Stock';
}

export function formatPrice(price: number | null): string | null {
  if (price === null) return null;
  return `₹${Number.isInteger(price) ? price : price.toFixed(2)}`;
}

export function createRestockEmbed(product: Product, event: TransitionEvent): EmbedBuilder {
  const { label, emoji } = CATEGORY_LABELS[product.category];

  const embed = new EmbedBuilder()
    .setColor(0x00cc66)
    .setTitle('Back in Stock')
    .setDescription(`**${product.name}** is available again.`)
    .setTimestamp(new Date(event.occurredAt))
    .setFooter({ text: FOOTER })
    .addFields({ name: 'Category', value: `${emoji} ${label}`, inline: true });

  const price = formatPrice(event.price);
  if (price) {
    embed.addFields({ name: 'Price', value: price, inline: true });
  }
  if (product.sku) {
    embed.addFields({ name: 'SKU', value: product.sku, inline: true });
  }
  if (product.url) {
    embed.setURL(product.url);
  }

  embed.addFields({
    name: '\u200b',
    value: 'You are receiving this because you subscribed to restock alerts for this product. ' +
      'You will be notified again if it sells out and comes back.',
  });

  return embed;
}

/** Availability of every catalog product, grouped by category. */
export function createStockEmbed(
  catalog: Catalog,
  baseline: ReadonlyMap<string, LastKnownState>,
  nextCheckAt: string | null
): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(0x0099ff)
    .setTitle('Stock Status')
    .setTimestamp()
    .setFooter({ text: FOOTER });

  for (const [category, products] of catalog.byCategory()) {
    const { label, emoji } = CATEGORY_LABELS[category];
    const lines = products.map(p => {
      const state = baseline.get(p.id);
      const price = formatPrice(state?.price ?? null);
      return `${formatStockLabel(state?.inStock)} ${p.name}${price ? ` - ${price}` : ''}`;
    });
    embed.addFields({ name: `${emoji} ${label}`, value: lines.join('\n') });
  }

  const lastUpdate = [...baseline.values()].reduce<string | null>(
    (latest, s) => (latest === null || s.updatedAt > latest ? s.updatedAt : latest),
    null
  );
  embed.addFields(
    { name: 'Last Updated', value: lastUpdate ? discordTimestamp(lastUpdate) : 'Never', inline: true },
    { name: 'Next Check', value: nextCheckAt ? discordTimestamp(nextCheckAt, 'R') : 'Not scheduled', inline: true }
  );

  return embed;
}

export function discordTimestamp(iso: string, style: 'f' | 'R' = 'f'): string {
  return `<t:${Math.floor(new Date(iso).getTime() / 1000)}:${style}>`;
}
