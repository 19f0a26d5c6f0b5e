/**
 * Message Handler
 *
 * Coordinates message processing using Chain of Responsibility pattern.
 * Each processor in the chain handles a specific type of message.
 * Failures are logged here and end processing of that message only.
 */

import { createLogger } from '@repost-guard/common-types';
import type { IMessageProcessor } from '../processors/IMessageProcessor.js';
import type { InboundMessage } from '../types/messages.js';

const logger = createLogger('MessageHandler');

/**
 * Message Handler - routes chat messages using Chain of Responsibility
 */
export class MessageHandler {
  constructor(private readonly processors: IMessageProcessor[]) {
    logger.info(
      { processorCount: processors.length },
      '[MessageHandler] Initialized with processor chain'
    );
  }

  /**
   * Handle an incoming message
   * Passes message through processor chain until one handles it
   */
  async handleMessage(message: InboundMessage): Promise<void> {
    const { chatId, messageId } = message;

    try {
      logger.debug({ chatId, messageId }, '[MessageHandler] Processing message');

      // Pass message through the chain of processors
      for (const processor of this.processors) {
        const wasHandled = await processor.process(message);

        if (wasHandled) {
          logger.debug(
            { chatId, messageId, processorName: processor.constructor.name },
            '[MessageHandler] Message handled by processor'
          );
          return; // Stop the chain
        }
      }

      // No processor handled the message
      logger.debug({ chatId, messageId }, '[MessageHandler] Message not handled by any processor');
    } catch (error) {
      logger.error({ err: error, chatId, messageId }, '[MessageHandler] Error processing message');
    }
  }
}
