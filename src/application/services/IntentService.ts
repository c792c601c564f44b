import { AssistantProfile, StructuredResult } from '../../core/entities/Assistant.js';
import { IntentName, IntentOutcome, IntentRequest, IntentResponse } from '../../core/entities/Intent.js';
import { TransientAssistantError } from '../../core/errors.js';
import type { Logger } from '../../utils/logger.js';
import { AssistantService } from './AssistantService.js';

export const TECHNICAL_PROBLEM_REPLY = 'Lo siento, hay un problema técnico. Por favor, inténtalo de nuevo.';
export const UNEXPECTED_ERROR_REPLY = 'Ha ocurrido un error inesperado. Por favor, inténtalo de nuevo.';

export interface AssistantIds {
  intakeAssistantId: string;
  adviceAssistantId: string;
}

/**
 * Profile per intent. needs_more_data shares the intake persona and asks for
 * the `needs_more_data` function call.
 */
export function buildProfiles(ids: AssistantIds): Record<IntentName, AssistantProfile> {
  return {
    intake: { assistantId: ids.intakeAssistantId, temperature: 0.2, maxTokens: 200 },
    needs_more_data: {
      assistantId: ids.intakeAssistantId,
      temperature: 0.2,
      maxTokens: 200,
      functionName: 'needs_more_data',
    },
    give_advice: { assistantId: ids.adviceAssistantId, temperature: 0.7, maxTokens: 250 },
  };
}

export function shapeNeedsMoreData(reply: string, structured: StructuredResult | null): IntentResponse {
  const response: IntentResponse = { reply, end_chat: false };

  if (!structured) {
    response.need = 'no';
    return response;
  }

  Object.assign(response, structured);
  if (response.need === undefined) {
    response.need = 'no';
  }
  if (response.need === 'yes') {
    response.back_to_intake = true;
  }
  return response;
}

export function shapeGiveAdvice(reply: string, structured: StructuredResult | null): IntentResponse {
  const response: IntentResponse = { reply, end_chat: false };
  if (structured?.need_intake) {
    response.back_to_intake = true;
  }
  return response;
}

/**
 * The three caller-facing operations. Never throws; failures become a fixed
 * apology with neutral defaults.
 */
export class IntentService {
  private profiles: Record<IntentName, AssistantProfile>;

  constructor(
    private assistantService: AssistantService,
    ids: AssistantIds,
    private logger: Logger
  ) {
    this.profiles = buildProfiles(ids);
  }

  intake(request: IntentRequest): Promise<IntentOutcome> {
    return this.handle('intake', request, (reply) => ({ reply, end_chat: false }));
  }

  needsMoreData(request: IntentRequest): Promise<IntentOutcome> {
    return this.handle('needs_more_data', request, shapeNeedsMoreData);
  }

  giveAdvice(request: IntentRequest): Promise<IntentOutcome> {
    return this.handle('give_advice', request, shapeGiveAdvice);
  }

  private async handle(
    intent: IntentName,
    request: IntentRequest,
    shape: (reply: string, structured: StructuredResult | null) => IntentResponse
  ): Promise<IntentOutcome> {
    const sessionId = request.session_id;
    this.logger.info({ intent, sessionId }, 'Processing request');

    try {
      const { reply, structured } = await this.assistantService.respond(
        sessionId,
        request.message,
        this.profiles[intent]
      );
      this.logger.info({ intent, sessionId }, 'Response generated');
      return { status: 200, body: shape(reply, structured) };
    } catch (error) {
      const transient = error instanceof TransientAssistantError;
      this.logger.error(
        { err: error, intent, sessionId },
        transient ? 'Assistant error' : 'Unexpected error'
      );

      const body: IntentResponse = {
        reply: transient ? TECHNICAL_PROBLEM_REPLY : UNEXPECTED_ERROR_REPLY,
        end_chat: false,
      };
      if (intent === 'needs_more_data') {
        body.need = 'no';
      }
      return { status: 500, body };
    }
  }
}
