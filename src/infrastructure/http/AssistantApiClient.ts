import fetch from 'node-fetch';
import { IAssistantClient, ListMessagesOptions } from '../../core/interfaces/IAssistantClient.js';
import {
  CreateRunParams,
  Run,
  Thread,
  ThreadMessage,
  ToolOutput,
} from '../../core/entities/Assistant.js';
import { AssistantApiError } from '../../core/errors.js';

export interface AssistantApiClientOptions {
  apiKey: string;
  baseUrl: string;
  requestTimeoutMs: number;
}

interface ListResponse<T> {
  object: 'list';
  data: T[];
  has_more: boolean;
}

interface ErrorBody {
  error?: { message?: string };
}

/**
 * Assistants API (v2) client implementation
 */
export class AssistantApiClient implements IAssistantClient {
  private baseUrl: string;

  constructor(private options: AssistantApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  createThread(): Promise<Thread> {
    return this.request<Thread>('POST', '/threads', {});
  }

  createMessage(threadId: string, role: 'user' | 'assistant', content: string): Promise<ThreadMessage> {
    return this.request<ThreadMessage>('POST', `/threads/${encodeURIComponent(threadId)}/messages`, {
      role,
      content,
    });
  }

  async listMessages(threadId: string, options: ListMessagesOptions): Promise<ThreadMessage[]> {
    const query = new URLSearchParams({
      limit: String(options.limit),
      order: options.order ?? 'desc',
    });
    const data = await this.request<ListResponse<ThreadMessage>>(
      'GET',
      `/threads/${encodeURIComponent(threadId)}/messages?${query.toString()}`
    );
    return data.data;
  }

  async deleteMessage(threadId: string, messageId: string): Promise<void> {
    await this.request<unknown>(
      'DELETE',
      `/threads/${encodeURIComponent(threadId)}/messages/${encodeURIComponent(messageId)}`
    );
  }

  createRun(threadId: string, params: CreateRunParams): Promise<Run> {
    return this.request<Run>('POST', `/threads/${encodeURIComponent(threadId)}/runs`, params);
  }

  retrieveRun(threadId: string, runId: string): Promise<Run> {
    return this.request<Run>('GET', this.runPath(threadId, runId));
  }

  submitToolOutputs(threadId: string, runId: string, outputs: ToolOutput[]): Promise<Run> {
    return this.request<Run>('POST', `${this.runPath(threadId, runId)}/submit_tool_outputs`, {
      tool_outputs: outputs,
    });
  }

  cancelRun(threadId: string, runId: string): Promise<Run> {
    return this.request<Run>('POST', `${this.runPath(threadId, runId)}/cancel`, {});
  }

  private runPath(threadId: string, runId: string): string {
    return `/threads/${encodeURIComponent(threadId)}/runs/${encodeURIComponent(runId)}`;
  }

  private async request<T>(method: 'GET' | 'POST' | 'DELETE', path: string, body?: unknown): Promise<T> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        'Content-Type': 'application/json',
        'OpenAI-Beta': 'assistants=v2',
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      timeout: this.options.requestTimeoutMs,
    });

    if (!res.ok) {
      const detail = await this.readErrorMessage(res.text());
      throw new AssistantApiError(`HTTP ${res.status} ${method} ${path}${detail ? `: ${detail}` : ''}`, res.status);
    }

    return (await res.json()) as T;
  }

  private async readErrorMessage(text: Promise<string>): Promise<string> {
    const raw = await text;
    try {
      const parsed = JSON.parse(raw) as ErrorBody;
      return parsed.error?.message ?? raw;
    } catch {
      return raw;
    }
  }
}
