import { IAssistantClient } from '../../core/interfaces/IAssistantClient.js';
import type { Logger } from '../../utils/logger.js';

export const HISTORY_FETCH_LIMIT = 100;
export const DEFAULT_MAX_MESSAGES = 25;

/**
 * Number of oldest messages to drop so that at most `maxMessages` remain,
 * rounded up to an even count so user/assistant pairs stay together.
 */
export function messagesToTrim(total: number, maxMessages: number): number {
  if (total <= maxMessages) {
    return 0;
  }
  const excess = total - maxMessages;
  return Math.min(excess % 2 === 0 ? excess : excess + 1, total);
}

/**
 * Keeps remote threads within a bounded message count
 */
export class HistoryService {
  constructor(
    private client: IAssistantClient,
    private logger: Logger,
    private maxMessages: number = DEFAULT_MAX_MESSAGES
  ) {}

  /**
   * Delete the oldest messages beyond the cap. Best effort throughout; returns
   * how many deletions were attempted.
   */
  async trim(threadId: string): Promise<number> {
    try {
      const messages = await this.client.listMessages(threadId, { limit: HISTORY_FETCH_LIMIT });
      const count = messagesToTrim(messages.length, this.maxMessages);
      if (count === 0) {
        return 0;
      }

      // The listing is newest-first; created_at is in seconds and ties are common
      const oldestFirst = [...messages].reverse();

      for (const message of oldestFirst.slice(0, count)) {
        try {
          await this.client.deleteMessage(threadId, message.id);
        } catch (error) {
          this.logger.warn({ err: error, threadId, messageId: message.id }, 'Failed to delete message');
        }
      }

      this.logger.info({ threadId, trimmed: count }, 'Trimmed thread history');
      return count;
    } catch (error) {
      this.logger.error({ err: error, threadId }, 'Error trimming thread history');
      return 0;
    }
  }
}
