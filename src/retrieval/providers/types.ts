/**
 * Generation Backend Types
 */

import type { BaseMessage } from '@langchain/core/messages';

export const GENERATION_BACKENDS = [
  'llama',
  'gemma',
  'qwen',
  'mistral',
  'zephyr',
  'openai',
  'google',
  'anthropic',
  'ollama',
] as const;

export type GenerationBackendId = (typeof GENERATION_BACKENDS)[number];

/**
 * Where requests for a backend are sent. openrouter and huggingface are
 * OpenAI-compatible gateways.
 */
export type BackendGateway =
  | 'openrouter'
  | 'huggingface'
  | 'openai'
  | 'google'
  | 'anthropic'
  | 'ollama';

export interface GenerationBackend {
  id: GenerationBackendId;
  label: string;
  gateway: BackendGateway;
  defaultModel: string;
  // env key overriding defaultModel, for the direct providers
  modelConfigKey?: string;
  // false: system instruction and user message are folded into one message
  supportsSystemRole: boolean;
  temperature: number;
  maxTokens: number;
  description: string;
}

export interface BackendDescription {
  id: GenerationBackendId;
  label: string;
  gateway: BackendGateway;
  model: string;
  supportsSystemRole: boolean;
  description: string;
  configured: boolean;
}

/**
 * The part of a chat model generation relies on.
 */
export interface ChatModel {
  invoke(
    messages: BaseMessage[],
    options?: { signal?: AbortSignal },
  ): Promise<BaseMessage>;
}

export function isGenerationBackendId(
  value: unknown,
): value is GenerationBackendId {
  return GENERATION_BACKENDS.some((backend) => backend === value);
}
