/**
 * Caller-facing intent payloads
 */
export type IntentName = 'intake' | 'needs_more_data' | 'give_advice';

export interface IntentRequest {
  message: string;
  session_id: string;
  history: unknown[];
  metadata: Record<string, unknown>;
}

export interface IntentResponse {
  reply: string;
  end_chat: boolean;
  need?: string;
  back_to_intake?: boolean;
  [key: string]: unknown;
}

export interface IntentOutcome {
  status: 200 | 500;
  body: IntentResponse;
}
