/**
 * Generation Service
 * Sends an assembled prompt to one generation backend and returns the answer
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HumanMessage,
  SystemMessage,
  type BaseMessage,
} from '@langchain/core/messages';
import {
  RagError,
  fail,
  succeed,
  toError,
  type Outcome,
} from '../../common/errors';
import { getPositiveInt, withTimeout } from '../../common/utils';
import {
  GenerationError,
  type GenerationFailureReason,
} from '../errors/retrieval-errors';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import type { GenerationBackend } from '../providers/types';
import type { AssembledPrompt } from '../types';

const DEFAULT_TIMEOUT_MS = 120000;

export interface GenerationResult {
  answer: string;
  backend: GenerationBackend['id'];
  model: string;
  durationMs: number;
}

/**
 * Backends without a system role get both parts in one human message.
 */
export function buildMessages(
  prompt: Pick<AssembledPrompt, 'systemInstruction' | 'userMessage'>,
  supportsSystemRole: boolean,
): BaseMessage[] {
  if (!supportsSystemRole) {
    return [
      new HumanMessage(`${prompt.systemInstruction}\n\n${prompt.userMessage}`),
    ];
  }
  return [
    new SystemMessage(prompt.systemInstruction),
    new HumanMessage(prompt.userMessage),
  ];
}

export function messageText(message: BaseMessage): string {
  const { content } = message;
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map((part) =>
      'text' in part && typeof part.text === 'string' ? part.text : '',
    )
    .join('');
}

function statusOf(error: Error): number | null {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return null;
}

/**
 * Map a provider error onto a failure reason, by HTTP status when the
 * client exposes one, otherwise by message.
 */
export function classifyGenerationError(error: Error): GenerationFailureReason {
  const status = statusOf(error);
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate_limit';
  if (status !== null && status >= 400 && status < 500) {
    return 'malformed_request';
  }
  if (status !== null) return 'unavailable';

  const message = error.message.toLowerCase();
  if (/unauthori[sz]ed|forbidden|api key|authentication/.test(message)) {
    return 'auth';
  }
  if (/rate limit|quota|too many requests/.test(message)) {
    return 'rate_limit';
  }
  if (/bad request|invalid|context length|too long/.test(message)) {
    return 'malformed_request';
  }
  return 'unavailable';
}

@Injectable()
export class GenerationService {
  private readonly logger = new Logger(GenerationService.name);
  private readonly timeoutMs: number;

  constructor(
    private readonly llmProviderFactory: LLMProviderFactory,
    private readonly configService: ConfigService,
  ) {
    this.timeoutMs = getPositiveInt(
      this.configService,
      'GENERATION_TIMEOUT_MS',
      DEFAULT_TIMEOUT_MS,
    );
  }

  async generate(
    prompt: AssembledPrompt,
    backendId?: string,
    signal?: AbortSignal,
  ): Promise<Outcome<GenerationResult>> {
    const startTime = Date.now();

    try {
      const backend = this.llmProviderFactory.resolveBackend(backendId);
      const model = this.llmProviderFactory.getModelName(backend);
      const chatModel = this.llmProviderFactory.createChatModel(backend);

      const response = await withTimeout(
        (timeoutSignal) =>
          chatModel.invoke(buildMessages(prompt, backend.supportsSystemRole), {
            signal: timeoutSignal,
          }),
        this.timeoutMs,
        `Generation with ${backend.id}`,
        signal,
      );

      const answer = messageText(response).trim();
      if (answer === '') {
        this.logger.error(`Failed to get response from ${backend.id}: empty answer`);
        return fail(
          new GenerationError(
            'empty_answer',
            backend.id,
            'the model returned no text',
          ),
        );
      }

      const durationMs = Date.now() - startTime;
      this.logger.log(
        `Generated ${answer.length} chars with ${backend.id} (${model}) in ${durationMs}ms`,
      );
      return succeed({ answer, backend: backend.id, model, durationMs });
    } catch (error) {
      const cause = toError(error);
      const failure =
        cause instanceof RagError
          ? cause
          : new GenerationError(
              classifyGenerationError(cause),
              backendId ?? 'default',
              cause.message,
              cause,
            );
      this.logger.error(`LLM invocation error: ${failure.message}`);
      return fail(failure);
    }
  }
}
