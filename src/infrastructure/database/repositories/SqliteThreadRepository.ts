import { IThreadRepository } from '../../../core/interfaces/IThreadRepository.js';
import { ThreadBindingRecord } from '../../../core/entities/Thread.js';
import { DatabaseConnection } from '../DatabaseConnection.js';

/**
 * SQLite implementation of the thread repository. One row per session,
 * no expiry.
 */
export class SqliteThreadRepository implements IThreadRepository {
  readonly backend = 'sqlite' as const;

  constructor(private connection: DatabaseConnection) {}

  async getThreadId(sessionId: string): Promise<string | null> {
    const row = this.connection
      .getDatabase()
      .prepare<[string], Pick<ThreadBindingRecord, 'thread_id'>>(
        'SELECT thread_id FROM threads WHERE session_id = ?'
      )
      .get(sessionId);
    return row ? row.thread_id : null;
  }

  async saveThreadId(sessionId: string, threadId: string): Promise<void> {
    this.connection
      .getDatabase()
      .prepare(`
      INSERT INTO threads (session_id, thread_id, created_at, updated_at)
      VALUES (?, ?, CURRENT_TIMESTAMP, CURRENT_TIMESTAMP)
      ON CONFLICT(session_id) DO UPDATE SET
        thread_id = excluded.thread_id,
        updated_at = CURRENT_TIMESTAMP
    `)
      .run(sessionId, threadId);
  }

  /**
   * Full binding row, for diagnostics and tests
   */
  getBinding(sessionId: string): ThreadBindingRecord | null {
    const row = this.connection
      .getDatabase()
      .prepare<[string], ThreadBindingRecord>('SELECT * FROM threads WHERE session_id = ?')
      .get(sessionId);
    return row ?? null;
  }

  countBindings(): number {
    const row = this.connection
      .getDatabase()
      .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM threads')
      .get();
    return row ? row.count : 0;
  }

  async close(): Promise<void> {
    this.connection.close();
  }
}
