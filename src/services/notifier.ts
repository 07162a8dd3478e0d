import { DiscordAPIError, RESTJSONErrorCodes, RateLimitError } from 'discord.js';
import type { MessageCreateOptions } from 'discord.js';
import type { Catalog } from '../catalog.js';
import { DeliveryError, errorMessage } from '../errors.js';
import type { ChatId, DeliveryFailureReason, MessageSender, TransitionEvent } from '../types.js';
import { createRestockEmbed } from '../utils/embed.js';

export function classifyDiscordError(error: unknown): DeliveryFailureReason {
  if (error instanceof RateLimitError) return 'rate_limited';
  if (error instanceof DiscordAPIError) {
    if (error.status === 429) return 'rate_limited';
    if (error.code === RESTJSONErrorCodes.CannotSendMessagesToThisUser) return 'blocked';
    if (error.code === RESTJSONErrorCodes.UnknownUser) return 'unknown_recipient';
  }
  return 'send_failed';
}

export interface DirectMessageClient {
  users: {
    fetch(userId: string): Promise<{ send(options: MessageCreateOptions): Promise<unknown> }>;
  };
}

/** Sends restock notices as direct messages to the subscriber. */
export function createDiscordSender(client: DirectMessageClient, catalog: Catalog): MessageSender {
  return async (chatId: ChatId, event: TransitionEvent): Promise<void> => {
    const product = catalog.get(event.productId);
    if (!product) {
      throw new DeliveryError(chatId, 'send_failed', `Unknown product ${event.productId}`);
    }

    try {
      const user = await client.users.fetch(chatId);
      await user.send({
        content: `🔔 **${product.name}** is back in stock!`,
        embeds: [createRestockEmbed(product, event)],
      });
    } catch (error) {
      throw new DeliveryError(chatId, classifyDiscordError(error), errorMessage(error), { cause: error });
    }
  };
}
