import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HELP_TEXT, handleDirectMessage } from '../src/bot.js';
import { loadCatalog } from '../src/catalog.js';
import { Database } from '../src/services/database.js';

const catalog = loadCatalog();
const CHAT_ID = '1000000000000000042';

describe('handleDirectMessage', () => {
  let db: Database;

  const send = async (content: string): Promise<string | undefined> => {
    const reply = vi.fn(async (_text: string) => ({}));
    await handleDirectMessage({ content, author: { id: CHAT_ID }, reply }, db, catalog);
    expect(reply).toHaveBeenCalledTimes(1);
    return reply.mock.calls[0]?.[0];
  };

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('subscribes to a catalog product', async () => {
    expect(await send('subscribe paneer-regular-24')).toBe('✅ Watching **High Protein Paneer | Pack of 24**');
    expect(db.getSubscriptions(CHAT_ID)).toEqual(['paneer-regular-24']);
    expect(await send('watch paneer-regular-24')).toBe('⚠️ You are already watching **High Protein Paneer | Pack of 24**');
  });

  it('rejects unknown products', async () => {
    expect(await send('subscribe protein-bar')).toBe(
      'Please give a valid product id. Example: `subscribe whey-chocolate-32`'
    );
    expect(await send('subscribe')).toBe('Please give a valid product id. Example: `subscribe whey-chocolate-32`');
    expect(db.getSubscriptions(CHAT_ID)).toEqual([]);
  });

  it('lists and removes subscriptions', async () => {
    await send('subscribe paneer-regular-24');
    db.updateBaseline('paneer-regular-24', false, '2026-03-01T09:00:00.000Z');

    expect(await send('list')).toBe('**Your alerts:**\n• **High Protein Paneer | Pack of 24** 🔴 Out of Stock');
    expect(await send('UNSUBSCRIBE paneer-regular-24')).toBe('✅ Stopped watching **High Protein Paneer | Pack of 24**');
    expect(await send('unwatch paneer-regular-24')).toBe('⚠️ You are not watching **High Protein Paneer | Pack of 24**');
    expect(await send('subscriptions')).toBe('You are not watching any products.');
  });

  it('shows the last alert sent for a subscription', async () => {
    await send('subscribe paneer-regular-24');
    db.recordDelivery({
      chatId: CHAT_ID,
      productId: 'paneer-regular-24',
      delivered: true,
      reason: null,
      sentAt: '2026-03-01T09:00:00.000Z',
    });

    expect(await send('list')).toBe(
      '**Your alerts:**\n• **High Protein Paneer | Pack of 24** ⚪ Unknown, last alert <t:1772355600:f>'
    );
  });

  it('shows the last known price', async () => {
    await send('subscribe paneer-regular-24');
    db.updateBaseline('paneer-regular-24', true, '2026-03-01T09:00:00.000Z', 479.5);

    expect(await send('list')).toBe('**Your alerts:**\n• **High Protein Paneer | Pack of 24** 🟢 In Stock (₹479.50)');
  });

  it('asks for a product id when unsubscribing', async () => {
    expect(await send('unsubscribe')).toBe('Please give a product id. Example: `unsubscribe whey-chocolate-32`');
  });

  it('answers help and empty messages with the command list', async () => {
    expect(await send('help')).toBe(HELP_TEXT);
    expect(await send('  ')).toBe(HELP_TEXT);
  });

  it('points unknown commands at help', async () => {
    expect(await send('dance')).toBe("I didn't understand that. Send `help` for commands.");
  });
});
