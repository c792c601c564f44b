/**
 * Persisted mapping from a caller session to a remote conversation thread
 */
export interface ThreadBindingRecord {
  session_id: string;
  thread_id: string;
  created_at: string;
  updated_at: string;
}
