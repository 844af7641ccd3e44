import { logger } from '../../utils/logger';
import { detectQueryIntent } from './intentDetector';
import {
  formatInvalidOrderNumber,
  formatOrderLookupError,
  formatOrderReply,
  formatPartLookupError,
  formatPartReply,
  formatStatusLookupError,
  formatStatusReply,
} from './replyFormatter';
import type { OrderRecord, PartWithAvailability, PartWithStatus, QueryProcessor } from './types';

export interface ChatbotLookups {
  searchParts(term: string, limit?: number): Promise<PartWithAvailability[]>;
  searchPartsForStatus(term: string, limit?: number): Promise<PartWithStatus[]>;
  getOrderData(orderNumber: number): Promise<OrderRecord | null>;
}

/**
 * Answers chat messages that read like inventory or order questions straight
 * from the database. Anything it does not recognise resolves to null so the
 * caller can hand the message to the language model.
 *
 * The lookups are expected to throw on database errors; those become an
 * error reply rather than a "not found" one.
 */
export class AutomaticQueryService implements QueryProcessor {
  constructor(private readonly lookups: ChatbotLookups) {}

  async process(text: string): Promise<string | null> {
    const intent = detectQueryIntent(text);
    if (!intent) {
      return null;
    }

    logger.debug('[auto-query] intent detected', {
      type: intent.type,
      value: intent.type === 'order' ? intent.number : intent.term,
    });

    switch (intent.type) {
      case 'part': {
        const { term } = intent;
        return this.answer(formatPartLookupError(term), async () => {
          const parts = await this.lookups.searchParts(term);
          return formatPartReply(term, parts);
        });
      }
      case 'order': {
        const { number } = intent;
        const orderNumber = Number(number);
        if (!Number.isSafeInteger(orderNumber)) {
          return formatInvalidOrderNumber(number);
        }
        return this.answer(formatOrderLookupError(number), async () => {
          const order = await this.lookups.getOrderData(orderNumber);
          return formatOrderReply(number, order);
        });
      }
      case 'status': {
        const { term } = intent;
        return this.answer(formatStatusLookupError(term), async () => {
          const parts = await this.lookups.searchPartsForStatus(term);
          return formatStatusReply(term, parts);
        });
      }
    }
  }

  private async answer(errorReply: string, lookup: () => Promise<string>): Promise<string> {
    try {
      return await lookup();
    } catch (error) {
      logger.error('[auto-query] lookup failed', { err: logger.serializeError(error) });
      return errorReply;
    }
  }
}
