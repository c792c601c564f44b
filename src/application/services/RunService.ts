import { IAssistantClient } from '../../core/interfaces/IAssistantClient.js';
import {
  AssistantProfile,
  CreateRunParams,
  FunctionToolCall,
  PENDING_RUN_STATUSES,
  Run,
  StructuredResult,
  TurnResult,
} from '../../core/entities/Assistant.js';
import { RunTimeoutError, TransientAssistantError } from '../../core/errors.js';
import { sleep, toTransientError } from '../../utils/retry.js';
import type { Logger } from '../../utils/logger.js';
import { ThreadService } from './ThreadService.js';
import { HistoryService } from './HistoryService.js';

export interface RunOptions {
  pollIntervalMs: number;
  maxRunWaitMs: number;
}

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  pollIntervalMs: 200,
  maxRunWaitMs: 60000,
};

/**
 * Parse function-call arguments into an object. Anything that is not a JSON
 * object collapses to null.
 */
export function parseFunctionArguments(raw: string): StructuredResult | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Drives one turn against the remote assistant: resolve the thread, trim it,
 * append the user message, submit a run and poll it to a terminal state,
 * answering any function-call round-trips on the way.
 */
export class RunService {
  constructor(
    private client: IAssistantClient,
    private threads: ThreadService,
    private history: HistoryService,
    private logger: Logger,
    private options: RunOptions = DEFAULT_RUN_OPTIONS
  ) {}

  /**
   * Run one turn. Every failure surfaces as a TransientAssistantError.
   */
  async execute(sessionId: string, message: string, profile: AssistantProfile): Promise<TurnResult> {
    try {
      const threadId = await this.resolveThread(sessionId);

      await this.history.trim(threadId);
      await this.client.createMessage(threadId, 'user', message);

      const startedAt = Date.now();
      let run = await this.client.createRun(threadId, this.buildRunParams(profile));
      let structured: StructuredResult | null = null;

      run = await this.waitForRun(threadId, run, startedAt);
      while (run.status === 'requires_action') {
        const toolCalls = run.required_action?.submit_tool_outputs.tool_calls ?? [];
        structured = this.extractFunctionResult(toolCalls, profile.functionName) ?? structured;

        const output = structured ? JSON.stringify(structured) : '{}';
        run = await this.client.submitToolOutputs(
          threadId,
          run.id,
          toolCalls.map((call) => ({ tool_call_id: call.id, output }))
        );
        run = await this.waitForRun(threadId, run, startedAt);
      }

      if (run.status === 'completed') {
        const pending = run.required_action?.submit_tool_outputs.tool_calls ?? [];
        structured = structured ?? this.extractFunctionResult(pending, profile.functionName);
        const reply = await this.readLatestReply(threadId);
        return { reply, structured };
      }

      if (run.status === 'failed') {
        const detail = run.last_error ? `${run.last_error.code}: ${run.last_error.message}` : 'unknown error';
        this.logger.error({ sessionId, runId: run.id, lastError: run.last_error }, 'Run failed');
        throw new TransientAssistantError(`Assistant run failed: ${detail}`);
      }

      this.logger.error({ sessionId, runId: run.id, status: run.status }, 'Unexpected run status');
      throw new TransientAssistantError(`Unexpected run status: ${run.status}`);
    } catch (error) {
      throw toTransientError(error);
    }
  }

  private async resolveThread(sessionId: string): Promise<string> {
    const existing = await this.threads.get(sessionId);
    if (existing) {
      this.logger.info({ sessionId, threadId: existing }, 'Using existing thread');
      return existing;
    }

    const thread = await this.client.createThread();
    await this.threads.put(sessionId, thread.id);
    this.logger.info({ sessionId, threadId: thread.id }, 'Created new thread');
    return thread.id;
  }

  private buildRunParams(profile: AssistantProfile): CreateRunParams {
    const params: CreateRunParams = {
      assistant_id: profile.assistantId,
      temperature: profile.temperature,
      max_completion_tokens: profile.maxTokens,
    };
    if (profile.functionName) {
      params.tools = [{ type: 'function', function: { name: profile.functionName } }];
    }
    return params;
  }

  /**
   * Poll until the run leaves the pending statuses. Past the deadline the run
   * is cancelled (best effort) and RunTimeoutError is raised.
   */
  private async waitForRun(threadId: string, initial: Run, startedAt: number): Promise<Run> {
    let run = initial;
    while (PENDING_RUN_STATUSES.includes(run.status)) {
      const waited = Date.now() - startedAt;
      if (waited >= this.options.maxRunWaitMs) {
        await this.cancelQuietly(threadId, run.id);
        throw new RunTimeoutError(run.id, waited);
      }
      await sleep(this.options.pollIntervalMs);
      run = await this.client.retrieveRun(threadId, run.id);
    }
    return run;
  }

  private async cancelQuietly(threadId: string, runId: string): Promise<void> {
    try {
      await this.client.cancelRun(threadId, runId);
    } catch (error) {
      this.logger.warn({ err: error, threadId, runId }, 'Failed to cancel timed-out run');
    }
  }

  private extractFunctionResult(
    toolCalls: FunctionToolCall[],
    functionName: string | undefined
  ): StructuredResult | null {
    if (!functionName) {
      return null;
    }

    let result: StructuredResult | null = null;
    for (const call of toolCalls) {
      if (call.function.name !== functionName) {
        continue;
      }
      const parsed = parseFunctionArguments(call.function.arguments);
      if (parsed === null) {
        this.logger.warn({ functionName, arguments: call.function.arguments }, 'Failed to parse function arguments');
      }
      result = parsed;
    }
    return result;
  }

  private async readLatestReply(threadId: string): Promise<string> {
    const [latest] = await this.client.listMessages(threadId, { limit: 1, order: 'desc' });
    if (!latest || latest.role !== 'assistant') {
      throw new TransientAssistantError('No assistant response found');
    }

    const text = latest.content.find((part) => part.type === 'text' && part.text !== undefined);
    if (!text?.text) {
      throw new TransientAssistantError('No assistant response found');
    }
    return text.text.value;
  }
}
