export type ProductCategory = 'whey_protein' | 'protein_shake' | 'protein_drink' | 'paneer';

export interface Product {
  id: string;
  name: string;
  category: ProductCategory;
  sku?: string;
  url?: string;
}

// Discord snowflakes do not fit in a JS number, so chat ids stay strings.
export type ChatId = string;

export interface Subscriber {
  chatId: ChatId;
  subscribedProducts: Set<string>;
  joinedAt: string;
}

/** One product's reading from a single poll. `price` is null when the upstream sent none. */
export interface StockReading {
  inStock: boolean;
  price: number | null;
}

export type AvailabilitySnapshot = Map<string, StockReading>;

export interface LastKnownState {
  productId: string;
  inStock: boolean;
  price: number | null;
  updatedAt: string;
}

export interface TransitionEvent {
  productId: string;
  previousState: boolean;
  newState: boolean;
  price: number | null;
  occurredAt: string;
}

export type Baseline = Map<string, LastKnownState>;

export type Awaitable<T> = T | Promise<T>;

export type SubscribersOf = (productId: string) => Awaitable<Set<ChatId>>;

export type MessageSender = (chatId: ChatId, event: TransitionEvent) => Promise<void>;

export type DeliveryFailureReason =
  | 'blocked'
  | 'unknown_recipient'
  | 'rate_limited'
  | 'send_failed'
  | 'lookup_failed';

export interface DeliveryFailure {
  chatId: ChatId | null;
  productId: string;
  reason: DeliveryFailureReason;
  message: string;
}

export interface DispatchReport {
  eventsProcessed: number;
  sendsAttempted: number;
  sendsSucceeded: number;
  sendsFailed: number;
  skipped: number;
  failures: DeliveryFailure[];
}

export type CyclePhase = 'idle' | 'fetching' | 'diffing' | 'dispatching' | 'persisting';

export type SkipReason = 'cycle_in_progress' | 'quiet_hours';

export type CycleResult =
  | { status: 'skipped'; reason: 'cycle_in_progress' }
  | { status: 'fetch_failed' | 'store_failed'; error: string; startedAt: string; finishedAt: string }
  | {
      status: 'completed';
      startedAt: string;
      finishedAt: string;
      productsObserved: number;
      events: TransitionEvent[];
      report: DispatchReport;
      persisted: number;
      persistFailures: number;
    };

export interface DeliveryRecord {
  chatId: ChatId;
  productId: string;
  delivered: boolean;
  reason: DeliveryFailureReason | null;
  sentAt: string;
}

export interface HourWindow {
  start: number;
  end: number;
}

export interface Config {
  discord: {
    token: string;
    clientId: string;
    guildId?: string;
  };
  stockApi: {
    url: string;
    sessionUrl?: string;
    preferences?: { url: string; store: string };
    timeoutMs: number;
  };
  monitoring: {
    pollIntervalSeconds: number;
    peakPollIntervalSeconds?: number;
    peakHours?: HourWindow;
    quietHours?: HourWindow;
    timezone: string;
    shutdownTimeoutMs: number;
  };
  delivery: {
    sendConcurrency: number;
    sendRateLimit: number;
  };
  dataDir: string;
  catalogPath?: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

/** What the polling core needs from persistence. Every method is an idempotent read or upsert. */
export interface SubscriptionStore {
  getSubscribers(productId: string): Awaitable<Set<ChatId>>;
  getBaseline(): Awaitable<Baseline>;
  updateBaseline(productId: string, inStock: boolean, timestamp: string, price?: number | null): Awaitable<void>;
  recordDelivery?(record: DeliveryRecord): void;
}
