/**
 * Embedding Provider Factory
 * Multi-provider support: Ollama, OpenAI, Google
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import { MissingCredentialError } from '../common/errors';
import {
  isEmbeddingProvider,
  type EmbeddingProvider,
} from './index-layout';

export interface EmbeddingProviderConfig {
  provider: EmbeddingProvider;
  model: string;
  baseURL?: string;
}

const DEFAULT_MODELS: Record<EmbeddingProvider, string> = {
  ollama: 'bge-m3:567m',
  openai: 'text-embedding-3-small',
  google: 'text-embedding-004',
};

const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Create the embedding model for a provider/model pair; defaults to the
   * configured pair. Index loading passes the pair recorded at build time.
   * @throws MissingCredentialError when the provider needs an API key
   */
  createEmbeddingModel(
    provider: EmbeddingProvider = this.getProvider(),
    model: string = this.getModel(provider),
  ): Embeddings {
    this.logger.log(`Creating embedding model: ${provider}/${model}`);

    switch (provider) {
      case 'ollama':
        return this.createOllamaEmbeddings(model);
      case 'openai':
        return this.createOpenAIEmbeddings(model);
      case 'google':
        return this.createGoogleEmbeddings(model);
    }
  }

  /**
   * Get the configured provider and model
   */
  getProviderConfig(): EmbeddingProviderConfig {
    const provider = this.getProvider();

    return {
      provider,
      model: this.getModel(provider),
      baseURL:
        provider === 'ollama'
          ? this.configService.get<string>('OLLAMA_BASE_URL', DEFAULT_OLLAMA_URL)
          : undefined,
    };
  }

  /**
   * Get provider from config (default: ollama)
   */
  getProvider(): EmbeddingProvider {
    const provider = this.configService.get<string>(
      'EMBEDDING_PROVIDER',
      'ollama',
    );

    if (!isEmbeddingProvider(provider)) {
      this.logger.warn(
        `Invalid embedding provider: ${provider}, defaulting to ollama`,
      );
      return 'ollama';
    }

    return provider;
  }

  /**
   * Get model based on provider
   */
  getModel(provider: EmbeddingProvider): string {
    return this.configService.get<string>(
      `EMBEDDING_MODEL_${provider.toUpperCase()}`,
      DEFAULT_MODELS[provider],
    );
  }

  private createOllamaEmbeddings(model: string): OllamaEmbeddings {
    return new OllamaEmbeddings({
      model,
      baseUrl: this.configService.get<string>(
        'OLLAMA_BASE_URL',
        DEFAULT_OLLAMA_URL,
      ),
    });
  }

  private createOpenAIEmbeddings(model: string): OpenAIEmbeddings {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');

    if (!apiKey) {
      throw new MissingCredentialError('OPENAI_API_KEY', 'OpenAI embeddings');
    }

    return new OpenAIEmbeddings({
      model,
      apiKey,
    });
  }

  private createGoogleEmbeddings(model: string): GoogleGenerativeAIEmbeddings {
    const apiKey = this.configService.get<string>('GOOGLE_API_KEY');

    if (!apiKey) {
      throw new MissingCredentialError('GOOGLE_API_KEY', 'Google embeddings');
    }

    return new GoogleGenerativeAIEmbeddings({
      model,
      apiKey,
    });
  }
}
