/**
 * LLM Provider Factory
 * Creates chat models for the closed set of generation backends:
 * OpenRouter and Hugging Face router (OpenAI-compatible), OpenAI, Google,
 * Anthropic, Ollama
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import { MissingCredentialError } from '../../common/errors';
import { UnknownBackendError } from '../errors/retrieval-errors';
import { BACKEND_CATALOG, DEFAULT_BACKEND } from './generation-backends';
import {
  GENERATION_BACKENDS,
  isGenerationBackendId,
  type BackendDescription,
  type BackendGateway,
  type ChatModel,
  type GenerationBackend,
} from './types';

const DEFAULT_OPENROUTER_URL = 'https://openrouter.ai/api/v1';
const DEFAULT_HUGGINGFACE_URL = 'https://router.huggingface.co/v1';
const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

const CREDENTIAL_KEYS: Record<BackendGateway, string | null> = {
  openrouter: 'OPENROUTER_API_KEY',
  huggingface: 'HUGGINGFACE_API_KEY',
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  ollama: null,
};

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Resolve a backend id, defaulting to GENERATION_BACKEND (then llama).
   * @throws UnknownBackendError
   */
  resolveBackend(id?: string): GenerationBackend {
    const selected =
      id ?? this.configService.get<string>('GENERATION_BACKEND', DEFAULT_BACKEND);
    if (!isGenerationBackendId(selected)) {
      throw new UnknownBackendError(selected);
    }
    return BACKEND_CATALOG[selected];
  }

  getModelName(backend: GenerationBackend): string {
    if (!backend.modelConfigKey) {
      return backend.defaultModel;
    }
    return this.configService.get<string>(
      backend.modelConfigKey,
      backend.defaultModel,
    );
  }

  describeBackends(): BackendDescription[] {
    return GENERATION_BACKENDS.map((id) => {
      const backend = BACKEND_CATALOG[id];
      const credentialKey = CREDENTIAL_KEYS[backend.gateway];
      return {
        id,
        label: backend.label,
        gateway: backend.gateway,
        model: this.getModelName(backend),
        supportsSystemRole: backend.supportsSystemRole,
        description: backend.description,
        configured:
          credentialKey === null ||
          Boolean(this.configService.get<string>(credentialKey)),
      };
    });
  }

  /**
   * Create the chat model behind a backend
   * @throws MissingCredentialError when the backend's API key is not set
   */
  createChatModel(backend: GenerationBackend): ChatModel {
    const model = this.getModelName(backend);
    this.logger.log(
      `Creating chat model for backend ${backend.id}: ${backend.gateway}/${model}`,
    );

    switch (backend.gateway) {
      case 'openrouter':
        return this.createGatewayModel(
          backend,
          model,
          this.configService.get<string>('OPENROUTER_BASE_URL', DEFAULT_OPENROUTER_URL),
          {
            'HTTP-Referer': this.configService.get<string>(
              'OPENROUTER_REFERER',
              'http://localhost',
            ),
            'X-Title': this.configService.get<string>('SERVICE_NAME', 'tei-rag'),
          },
        );
      case 'huggingface':
        return this.createGatewayModel(
          backend,
          model,
          this.configService.get<string>(
            'HUGGINGFACE_BASE_URL',
            DEFAULT_HUGGINGFACE_URL,
          ),
        );
      case 'openai':
        return this.createGatewayModel(
          backend,
          model,
          this.configService.get<string>(
            'OPENAI_BASE_URL',
            'https://api.openai.com/v1',
          ),
        );
      case 'google':
        return new ChatGoogleGenerativeAI({
          model,
          temperature: backend.temperature,
          maxOutputTokens: backend.maxTokens,
          maxRetries: 2,
          apiKey: this.requireCredential(backend),
        });
      case 'anthropic':
        return new ChatAnthropic({
          model,
          temperature: backend.temperature,
          maxTokens: backend.maxTokens,
          maxRetries: 2,
          apiKey: this.requireCredential(backend),
        });
      case 'ollama':
        return new ChatOllama({
          model,
          temperature: backend.temperature,
          numPredict: backend.maxTokens,
          baseUrl: this.configService.get<string>(
            'OLLAMA_BASE_URL',
            DEFAULT_OLLAMA_URL,
          ),
        });
    }
  }

  private createGatewayModel(
    backend: GenerationBackend,
    model: string,
    baseURL: string,
    defaultHeaders?: Record<string, string>,
  ): ChatOpenAI {
    const apiKey = this.requireCredential(backend);
    return new ChatOpenAI({
      model,
      temperature: backend.temperature,
      maxTokens: backend.maxTokens,
      maxRetries: 2,
      apiKey,
      configuration: {
        baseURL,
        apiKey,
        defaultHeaders,
      },
    });
  }

  private requireCredential(backend: GenerationBackend): string {
    const key = CREDENTIAL_KEYS[backend.gateway] ?? `${backend.gateway} API key`;
    const value = this.configService.get<string>(key);
    if (!value) {
      throw new MissingCredentialError(key, `the ${backend.id} backend`);
    }
    return value;
  }
}
