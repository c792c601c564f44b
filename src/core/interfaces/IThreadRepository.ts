/**
 * Interface for session → thread persistence backends.
 * Implementations may throw; ThreadService absorbs their failures.
 */
export interface IThreadRepository {
  readonly backend: 'redis' | 'sqlite';

  getThreadId(sessionId: string): Promise<string | null>;

  saveThreadId(sessionId: string, threadId: string): Promise<void>;

  close(): Promise<void>;
}
