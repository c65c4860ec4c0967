import { ConfigService } from '@nestjs/config';
import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  type BaseMessage,
} from '@langchain/core/messages';
import { FakeListChatModel } from '@langchain/core/utils/testing';
import { MissingCredentialError, RagErrorKind } from '../../common/errors';
import { GenerationError } from '../errors/retrieval-errors';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import type { ChatModel } from '../providers/types';
import type { AssembledPrompt } from '../types';
import {
  GenerationService,
  buildMessages,
  classifyGenerationError,
} from './generation.service';

const PROMPT: AssembledPrompt = {
  systemInstruction: 'Tu es un agent RAG.',
  userMessage: 'Qui a découvert Plasmodium ?',
  sourceReferences: 'Source 1: Bulletin | 1923',
  context: 'Source 1:\nTitle: Bulletin\nDate: 1923\nContent: Laveran\n',
};

class RecordingChatModel implements ChatModel {
  readonly received: BaseMessage[][] = [];
  readonly signals: (AbortSignal | undefined)[] = [];

  constructor(private readonly reply: () => Promise<BaseMessage>) {}

  async invoke(
    messages: BaseMessage[],
    options?: { signal?: AbortSignal },
  ): Promise<BaseMessage> {
    this.received.push(messages);
    this.signals.push(options?.signal);
    return this.reply();
  }
}

function httpError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe('buildMessages', () => {
  it('sends system and user roles separately when supported', () => {
    const messages = buildMessages(PROMPT, true);

    expect(messages).toHaveLength(2);
    expect(messages[0]).toBeInstanceOf(SystemMessage);
    expect(messages[0].content).toBe('Tu es un agent RAG.');
    expect(messages[1]).toBeInstanceOf(HumanMessage);
    expect(messages[1].content).toBe('Qui a découvert Plasmodium ?');
  });

  it('folds both parts into one user message otherwise', () => {
    const messages = buildMessages(PROMPT, false);

    expect(messages).toHaveLength(1);
    expect(messages[0]).toBeInstanceOf(HumanMessage);
    expect(messages[0].content).toBe(
      'Tu es un agent RAG.\n\nQui a découvert Plasmodium ?',
    );
  });
});

describe('classifyGenerationError', () => {
  it.each([
    [httpError('Unauthorized', 401), 'auth'],
    [httpError('Forbidden', 403), 'auth'],
    [httpError('Too Many Requests', 429), 'rate_limit'],
    [httpError('Bad Request', 400), 'malformed_request'],
    [httpError('Bad Gateway', 502), 'unavailable'],
    [new Error('Invalid API key provided'), 'auth'],
    [new Error('You exceeded your current quota'), 'rate_limit'],
    [new Error("This model's maximum context length is 8192 tokens"), 'malformed_request'],
    [new Error('fetch failed'), 'unavailable'],
  ])('classifies %s', (error, reason) => {
    expect(classifyGenerationError(error)).toBe(reason);
  });
});

describe('GenerationService', () => {
  function createService(
    env: Record<string, string> = {},
  ): { service: GenerationService; factory: LLMProviderFactory } {
    const config = new ConfigService({ OPENROUTER_API_KEY: 'test-secret', ...env });
    const factory = new LLMProviderFactory(config);
    return { service: new GenerationService(factory, config), factory };
  }

  it('returns the trimmed answer with the backend and model', async () => {
    const { service, factory } = createService();
    jest
      .spyOn(factory, 'createChatModel')
      .mockReturnValue(
        new FakeListChatModel({ responses: ['  Alphonse Laveran (Source 1).  '] }),
      );

    const outcome = await service.generate(PROMPT, 'llama');

    if (!outcome.success) throw outcome.error;
    expect(outcome.value.answer).toBe('Alphonse Laveran (Source 1).');
    expect(outcome.value.backend).toBe('llama');
    expect(outcome.value.model).toBe('meta-llama/llama-4-maverick:free');
  });

  it('folds the prompt for backends without a system role', async () => {
    const { service, factory } = createService();
    const model = new RecordingChatModel(async () => new AIMessage('Réponse'));
    jest.spyOn(factory, 'createChatModel').mockReturnValue(model);

    const outcome = await service.generate(PROMPT, 'gemma');

    expect(outcome.success).toBe(true);
    expect(model.received).toHaveLength(1);
    expect(model.received[0]).toHaveLength(1);
    expect(model.received[0][0]).toBeInstanceOf(HumanMessage);
  });

  it('uses GENERATION_BACKEND when no backend is requested', async () => {
    const { service, factory } = createService({ GENERATION_BACKEND: 'qwen' });
    jest
      .spyOn(factory, 'createChatModel')
      .mockReturnValue(new FakeListChatModel({ responses: ['ok'] }));

    const outcome = await service.generate(PROMPT);

    if (!outcome.success) throw outcome.error;
    expect(outcome.value.backend).toBe('qwen');
  });

  it('treats a whitespace-only answer as a failure', async () => {
    const { service, factory } = createService();
    jest
      .spyOn(factory, 'createChatModel')
      .mockReturnValue(new FakeListChatModel({ responses: ['   \n '] }));

    const outcome = await service.generate(PROMPT, 'llama');

    if (outcome.success) throw new Error('expected failure');
    expect(outcome.error).toBeInstanceOf(GenerationError);
    if (outcome.error instanceof GenerationError) {
      expect(outcome.error.reason).toBe('empty_answer');
    }
  });

  it('classifies provider failures', async () => {
    const { service, factory } = createService();
    jest
      .spyOn(factory, 'createChatModel')
      .mockReturnValue(
        new RecordingChatModel(() =>
          Promise.reject(httpError('Too Many Requests', 429)),
        ),
      );

    const outcome = await service.generate(PROMPT, 'llama');

    if (outcome.success) throw new Error('expected failure');
    expect(outcome.error.kind).toBe(RagErrorKind.SERVICE);
    expect(outcome.error.retryable).toBe(true);
    if (outcome.error instanceof GenerationError) {
      expect(outcome.error.reason).toBe('rate_limit');
      expect(outcome.error.backend).toBe('llama');
    }
  });

  it('reports a missing credential as a configuration error', async () => {
    const { service } = createService({ OPENROUTER_API_KEY: '' });

    const outcome = await service.generate(PROMPT, 'llama');

    if (outcome.success) throw new Error('expected failure');
    expect(outcome.error).toBeInstanceOf(MissingCredentialError);
    expect(outcome.error.kind).toBe(RagErrorKind.CONFIGURATION);
  });

  it('rejects an unknown backend', async () => {
    const { service } = createService();

    const outcome = await service.generate(PROMPT, 'gpt-2');

    if (outcome.success) throw new Error('expected failure');
    expect(outcome.error.code).toBe('UNKNOWN_BACKEND');
  });

  it('times out distinctly from a service rejection', async () => {
    const { service, factory } = createService({ GENERATION_TIMEOUT_MS: '20' });
    const model = new RecordingChatModel(() => new Promise<BaseMessage>(() => undefined));
    jest.spyOn(factory, 'createChatModel').mockReturnValue(model);

    const outcome = await service.generate(PROMPT, 'llama');

    if (outcome.success) throw new Error('expected failure');
    expect(outcome.error.kind).toBe(RagErrorKind.TIMEOUT);
    expect(model.signals[0]?.aborted).toBe(true);
    expect(model.signals[0]?.reason).toBe(outcome.error);
  });

  it('passes the caller cancellation on to the model request', async () => {
    const { service, factory } = createService();
    const model = new RecordingChatModel(async () => new AIMessage('Réponse'));
    jest.spyOn(factory, 'createChatModel').mockReturnValue(model);
    const controller = new AbortController();
    controller.abort('stop');

    await service.generate(PROMPT, 'llama', controller.signal);

    expect(model.signals[0]?.aborted).toBe(true);
    expect(model.signals[0]?.reason).toBe('stop');
  });
});
