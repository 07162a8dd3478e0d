import type { ChatId, DeliveryFailureReason } from './types.js';

/** Stock API unreachable, non-2xx, or returned a payload we could not parse. */
export class UpstreamError extends Error {
  readonly status: number | null;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'UpstreamError';
    this.status = options.status ?? null;
  }
}

/** Persistence layer rejected a read or write. */
export class StoreError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'StoreError';
  }
}

export class DeliveryError extends Error {
  readonly chatId: ChatId;
  readonly reason: DeliveryFailureReason;

  constructor(chatId: ChatId, reason: DeliveryFailureReason, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'DeliveryError';
    this.chatId = chatId;
    this.reason = reason;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
