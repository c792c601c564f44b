/**
 * Assistant domain entities
 */

/**
 * Selects which remote persona answers a turn and with which generation
 * parameters. `functionName` names the single structured function call the
 * caller expects back, if any.
 */
export interface AssistantProfile {
  assistantId: string;
  temperature: number;
  maxTokens: number;
  functionName?: string;
}

export type RunStatus =
  | 'queued'
  | 'in_progress'
  | 'requires_action'
  | 'cancelling'
  | 'cancelled'
  | 'failed'
  | 'completed'
  | 'incomplete'
  | 'expired';

/** Statuses in which the remote assistant is still working on the run. */
export const PENDING_RUN_STATUSES: readonly RunStatus[] = ['queued', 'in_progress', 'cancelling'];

export interface FunctionToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

export interface RequiredAction {
  type: 'submit_tool_outputs';
  submit_tool_outputs: {
    tool_calls: FunctionToolCall[];
  };
}

export interface Run {
  id: string;
  thread_id: string;
  status: RunStatus;
  required_action?: RequiredAction | null;
  last_error?: { code: string; message: string } | null;
}

export interface MessageContent {
  type: string;
  text?: { value: string };
}

export interface ThreadMessage {
  id: string;
  thread_id: string;
  role: 'user' | 'assistant';
  content: MessageContent[];
  created_at: number;
}

export interface Thread {
  id: string;
  created_at: number;
}

export interface FunctionToolSpec {
  type: 'function';
  function: { name: string };
}

export interface CreateRunParams {
  assistant_id: string;
  temperature: number;
  max_completion_tokens: number;
  tools?: FunctionToolSpec[];
}

export interface ToolOutput {
  tool_call_id: string;
  output: string;
}

export type StructuredResult = Record<string, unknown>;

export interface TurnResult {
  reply: string;
  structured: StructuredResult | null;
}
