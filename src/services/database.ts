import BetterSqlite3 from 'better-sqlite3';
import { AvailabilityMonitor } from './availability-monitor.js';
import { StoreError, errorMessage } from '../errors.js';
import type {
  Baseline,
  ChatId,
  DeliveryFailureReason,
  DeliveryRecord,
  LastKnownState,
  Subscriber,
  SubscriptionStore,
} from '../types.js';

// Entry N upgrades a database at user_version N. Tables are only ever
// created or extended, never dropped, so subscriber history survives upgrades.
const MIGRATIONS: readonly string[] = [
  `
  CREATE TABLE IF NOT EXISTS subscribers (
    chat_id TEXT PRIMARY KEY,
    joined_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS subscriptions (
    chat_id TEXT NOT NULL REFERENCES subscribers(chat_id),
    product_id TEXT NOT NULL,
    active INTEGER NOT NULL DEFAULT 1,
    subscribed_at TEXT NOT NULL,
    unsubscribed_at TEXT,
    PRIMARY KEY (chat_id, product_id)
  );

  CREATE INDEX IF NOT EXISTS idx_subscriptions_product ON subscriptions(product_id, active);

  CREATE TABLE IF NOT EXISTS product_state (
    product_id TEXT PRIMARY KEY,
    in_stock INTEGER NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS delivery_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    chat_id TEXT NOT NULL,
    product_id TEXT NOT NULL,
    delivered INTEGER NOT NULL,
    reason TEXT,
    sent_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_delivery_chat_product ON delivery_log(chat_id, product_id, sent_at);
  `,
  'ALTER TABLE product_state ADD COLUMN price REAL;',
];

export const SCHEMA_VERSION = MIGRATIONS.length;

interface ProductStateRow {
  product_id: string;
  in_stock: number;
  price: number | null;
  updated_at: string;
}

interface SubscriberRow {
  chat_id: string;
  joined_at: string;
}

interface DeliveryRow {
  chat_id: string;
  product_id: string;
  delivered: number;
  reason: DeliveryFailureReason | null;
  sent_at: string;
}

export class Database implements SubscriptionStore {
  private db: BetterSqlite3.Database;

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.initialize();
  }

  private initialize(): void {
    const current = this.db.pragma('user_version', { simple: true });
    const version = typeof current === 'number' ? current : 0;
    if (version >= SCHEMA_VERSION) return;

    this.db.transaction(() => {
      for (const migration of MIGRATIONS.slice(version)) {
        this.db.exec(migration);
      }
      this.db.pragma(`user_version = ${SCHEMA_VERSION}`);
    })();
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StoreError(`Failed to ${action}: ${errorMessage(error)}`, { cause: error });
    }
  }

  ensureSubscriber(chatId: ChatId): void {
    this.db
      .prepare<[string, string]>('INSERT OR IGNORE INTO subscribers (chat_id, joined_at) VALUES (?, ?)')
      .run(chatId, new Date().toISOString());
  }

  /** Returns false when the subscription was already active. */
  subscribe(chatId: ChatId, productId: string): boolean {
    const tx = this.db.transaction((): boolean => {
      this.ensureSubscriber(chatId);
      const existing = this.db
        .prepare<[string, string], { active: number }>(
          'SELECT active FROM subscriptions WHERE chat_id = ? AND product_id = ?'
        )
        .get(chatId, productId);
      if (existing?.active === 1) return false;

      this.db
        .prepare<[string, string, string]>(`
          INSERT INTO subscriptions (chat_id, product_id, active, subscribed_at, unsubscribed_at)
          VALUES (?, ?, 1, ?, NULL)
          ON CONFLICT(chat_id, product_id) DO UPDATE SET
            active = 1,
            subscribed_at = excluded.subscribed_at,
            unsubscribed_at = NULL
        `)
        .run(chatId, productId, new Date().toISOString());
      return true;
    });
    return tx();
  }

  /** Marks the subscription inactive; the row is kept. Returns false if there was nothing to remove. */
  unsubscribe(chatId: ChatId, productId: string): boolean {
    const result = this.db
      .prepare<[string, string, string]>(`
        UPDATE subscriptions SET active = 0, unsubscribed_at = ?
        WHERE chat_id = ? AND product_id = ? AND active = 1
      `)
      .run(new Date().toISOString(), chatId, productId);
    return result.changes > 0;
  }

  getSubscriptions(chatId: ChatId): string[] {
    return this.db
      .prepare<[string], { product_id: string }>(
        'SELECT product_id FROM subscriptions WHERE chat_id = ? AND active = 1 ORDER BY product_id'
      )
      .all(chatId)
      .map(r => r.product_id);
  }

  getSubscriber(chatId: ChatId): Subscriber | null {
    const row = this.db
      .prepare<[string], SubscriberRow>('SELECT chat_id, joined_at FROM subscribers WHERE chat_id = ?')
      .get(chatId);
    if (!row) return null;

    return {
      chatId: row.chat_id,
      subscribedProducts: new Set(this.getSubscriptions(chatId)),
      joinedAt: row.joined_at,
    };
  }

  getSubscribers(productId: string): Set<ChatId> {
    return this.guard(`load subscribers of ${productId}`, () => {
      const rows = this.db
        .prepare<[string], { chat_id: string }>(
          'SELECT chat_id FROM subscriptions WHERE product_id = ? AND active = 1'
        )
        .all(productId);
      return new Set(rows.map(r => r.chat_id));
    });
  }

  getProductState(productId: string): LastKnownState | null {
    const row = this.db
      .prepare<[string], ProductStateRow>(
        'SELECT product_id, in_stock, price, updated_at FROM product_state WHERE product_id = ?'
      )
      .get(productId);
    return row ? toState(row) : null;
  }

  getBaseline(): Baseline {
    return this.guard('load baseline', () => {
      const rows = this.db
        .prepare<[], ProductStateRow>('SELECT product_id, in_stock, price, updated_at FROM product_state')
        .all();
      return AvailabilityMonitor.toBaseline(rows.map(toState));
    });
  }

  updateBaseline(productId: string, inStock: boolean, timestamp: string, price: number | null = null): void {
    this.guard(`update baseline for ${productId}`, () => {
      this.db
        .prepare<[string, number, number | null, string]>(`
          INSERT INTO product_state (product_id, in_stock, price, updated_at)
          VALUES (?, ?, ?, ?)
          ON CONFLICT(product_id) DO UPDATE SET
            in_stock = excluded.in_stock,
            price = excluded.price,
            updated_at = excluded.updated_at
        `)
        .run(productId, inStock ? 1 : 0, price, timestamp);
    });
  }

  recordDelivery(record: DeliveryRecord): void {
    this.db
      .prepare<[string, string, number, string | null, string]>(`
        INSERT INTO delivery_log (chat_id, product_id, delivered, reason, sent_at)
        VALUES (?, ?, ?, ?, ?)
      `)
      .run(record.chatId, record.productId, record.delivered ? 1 : 0, record.reason, record.sentAt);
  }

  /** Most recent successful notification, if any. */
  getLastDelivery(chatId: ChatId, productId: string): DeliveryRecord | null {
    const row = this.db
      .prepare<[string, string], DeliveryRow>(`
        SELECT chat_id, product_id, delivered, reason, sent_at FROM delivery_log
        WHERE chat_id = ? AND product_id = ? AND delivered = 1
        ORDER BY sent_at DESC, id DESC LIMIT 1
      `)
      .get(chatId, productId);
    if (!row) return null;

    return {
      chatId: row.chat_id,
      productId: row.product_id,
      delivered: row.delivered === 1,
      reason: row.reason,
      sentAt: row.sent_at,
    };
  }

  close(): void {
    this.db.close();
  }
}

function toState(row: ProductStateRow): LastKnownState {
  return {
    productId: row.product_id,
    inStock: Boolean(row.in_stock),
    price: row.price,
    updatedAt: row.updated_at,
  };
}
