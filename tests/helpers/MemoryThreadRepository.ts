import { IThreadRepository } from '../../src/core/interfaces/IThreadRepository.js';

/**
 * Map-backed repository with switches to simulate an unreachable backend
 */
export class MemoryThreadRepository implements IThreadRepository {
  readonly backend = 'sqlite' as const;
  readonly bindings: Map<string, string> = new Map();
  failReads = false;
  failWrites = false;
  writes = 0;

  async getThreadId(sessionId: string): Promise<string | null> {
    if (this.failReads) {
      throw new Error('backend unavailable');
    }
    return this.bindings.get(sessionId) ?? null;
  }

  async saveThreadId(sessionId: string, threadId: string): Promise<void> {
    if (this.failWrites) {
      throw new Error('backend unavailable');
    }
    this.writes++;
    this.bindings.set(sessionId, threadId);
  }

  async close(): Promise<void> {}
}
