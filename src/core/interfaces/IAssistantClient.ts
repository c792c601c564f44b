import {
  CreateRunParams,
  Run,
  Thread,
  ThreadMessage,
  ToolOutput,
} from '../entities/Assistant.js';

export interface ListMessagesOptions {
  limit: number;
  order?: 'asc' | 'desc';
}

/**
 * Interface for the remote assistant service
 */
export interface IAssistantClient {
  createThread(): Promise<Thread>;

  createMessage(threadId: string, role: 'user' | 'assistant', content: string): Promise<ThreadMessage>;

  /**
   * List messages of a thread, newest first unless `order` says otherwise
   */
  listMessages(threadId: string, options: ListMessagesOptions): Promise<ThreadMessage[]>;

  deleteMessage(threadId: string, messageId: string): Promise<void>;

  createRun(threadId: string, params: CreateRunParams): Promise<Run>;

  retrieveRun(threadId: string, runId: string): Promise<Run>;

  submitToolOutputs(threadId: string, runId: string, outputs: ToolOutput[]): Promise<Run>;

  cancelRun(threadId: string, runId: string): Promise<Run>;
}
