import { IThreadRepository } from '../../core/interfaces/IThreadRepository.js';

export const THREAD_KEY_PREFIX = 'thread:';
export const THREAD_TTL_SECONDS = 24 * 60 * 60;

/**
 * The slice of the ioredis client this repository talks to
 */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, expiryMode: 'EX', seconds: number): Promise<unknown>;
  quit(): Promise<unknown>;
}

/**
 * Redis implementation of the thread repository. Each binding expires
 * 24 hours after it was last written.
 */
export class RedisThreadRepository implements IThreadRepository {
  readonly backend = 'redis' as const;

  constructor(
    private client: KeyValueClient,
    private ttlSeconds: number = THREAD_TTL_SECONDS
  ) {}

  static keyFor(sessionId: string): string {
    return `${THREAD_KEY_PREFIX}${sessionId}`;
  }

  async getThreadId(sessionId: string): Promise<string | null> {
    return this.client.get(RedisThreadRepository.keyFor(sessionId));
  }

  async saveThreadId(sessionId: string, threadId: string): Promise<void> {
    await this.client.set(RedisThreadRepository.keyFor(sessionId), threadId, 'EX', this.ttlSeconds);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
