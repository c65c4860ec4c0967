import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatOllama } from '@langchain/ollama';
import { MissingCredentialError } from '../../common/errors';
import { UnknownBackendError } from '../errors/retrieval-errors';
import { LLMProviderFactory } from './llm-provider.factory';

describe('LLMProviderFactory', () => {
  function createFactory(env: Record<string, string> = {}): LLMProviderFactory {
    return new LLMProviderFactory(new ConfigService(env));
  }

  it('defaults to the llama backend', () => {
    expect(createFactory().resolveBackend().id).toBe('llama');
  });

  it('resolves the configured default backend', () => {
    expect(createFactory({ GENERATION_BACKEND: 'mistral' }).resolveBackend().id).toBe(
      'mistral',
    );
  });

  it('rejects backends outside the catalog', () => {
    expect(() => createFactory().resolveBackend('gpt-2')).toThrow(UnknownBackendError);
    expect(() =>
      createFactory({ GENERATION_BACKEND: 'nope' }).resolveBackend(),
    ).toThrow(UnknownBackendError);
  });

  it('lets env override the models of direct providers only', () => {
    const factory = createFactory({
      OPENAI_CHAT_MODEL: 'gpt-4o-mini',
      OLLAMA_CHAT_MODEL: 'llama3.2',
    });

    expect(factory.getModelName(factory.resolveBackend('openai'))).toBe('gpt-4o-mini');
    expect(factory.getModelName(factory.resolveBackend('ollama'))).toBe('llama3.2');
    expect(factory.getModelName(factory.resolveBackend('zephyr'))).toBe(
      'HuggingFaceH4/zephyr-7b-beta',
    );
  });

  it('describes every backend with its credential state', () => {
    const backends = createFactory({ OPENROUTER_API_KEY: 'test-secret' }).describeBackends();

    expect(backends.map(({ id }) => id)).toEqual([
      'llama',
      'gemma',
      'qwen',
      'mistral',
      'zephyr',
      'openai',
      'google',
      'anthropic',
      'ollama',
    ]);
    const byId = new Map(backends.map((backend) => [backend.id, backend]));
    expect(byId.get('llama')?.configured).toBe(true);
    expect(byId.get('mistral')?.configured).toBe(false);
    expect(byId.get('ollama')?.configured).toBe(true);
    expect(byId.get('gemma')?.supportsSystemRole).toBe(false);
  });

  it('builds OpenAI-compatible clients for the gateways', () => {
    const factory = createFactory({ HUGGINGFACE_API_KEY: 'test-secret' });

    const model = factory.createChatModel(factory.resolveBackend('zephyr'));

    expect(model).toBeInstanceOf(ChatOpenAI);
  });

  it('builds a local client for ollama without credentials', () => {
    const factory = createFactory();

    expect(factory.createChatModel(factory.resolveBackend('ollama'))).toBeInstanceOf(
      ChatOllama,
    );
  });

  it('requires the gateway credential', () => {
    const factory = createFactory();

    expect(() => factory.createChatModel(factory.resolveBackend('qwen'))).toThrow(
      new MissingCredentialError('OPENROUTER_API_KEY', 'the qwen backend'),
    );
  });
});
