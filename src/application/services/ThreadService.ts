import { IThreadRepository } from '../../core/interfaces/IThreadRepository.js';
import type { Logger } from '../../utils/logger.js';

/**
 * Session → thread store. Never throws: a failed read counts as a miss and a
 * failed write is dropped, since a lost binding only costs a fresh remote thread.
 */
export class ThreadService {
  constructor(
    private repository: IThreadRepository,
    private logger: Logger
  ) {}

  get backend(): IThreadRepository['backend'] {
    return this.repository.backend;
  }

  async get(sessionId: string): Promise<string | null> {
    try {
      return await this.repository.getThreadId(sessionId);
    } catch (error) {
      this.logger.error({ err: error, sessionId }, 'Error getting thread_id for session');
      return null;
    }
  }

  async put(sessionId: string, threadId: string): Promise<void> {
    try {
      await this.repository.saveThreadId(sessionId, threadId);
      this.logger.info({ sessionId, threadId }, 'Saved thread binding');
    } catch (error) {
      this.logger.error({ err: error, sessionId, threadId }, 'Error saving thread_id for session');
    }
  }

  async close(): Promise<void> {
    await this.repository.close();
  }
}
