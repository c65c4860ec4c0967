import type { GenerationBackend, GenerationBackendId } from './types';

export const DEFAULT_BACKEND: GenerationBackendId = 'llama';

export const BACKEND_CATALOG: Record<GenerationBackendId, GenerationBackend> = {
  llama: {
    id: 'llama',
    label: 'Llama 4 Maverick',
    gateway: 'openrouter',
    defaultModel: 'meta-llama/llama-4-maverick:free',
    supportsSystemRole: true,
    temperature: 0.7,
    maxTokens: 2000,
    description: 'Dernière génération de Llama, excellente compréhension du français',
  },
  gemma: {
    id: 'gemma',
    label: 'Gemma 3n',
    gateway: 'openrouter',
    defaultModel: 'google/gemma-3n-e4b-it:free',
    supportsSystemRole: false,
    temperature: 0.7,
    maxTokens: 2000,
    description: 'Fenêtre contextuelle 32K tokens, multilingue (140+ langues)',
  },
  qwen: {
    id: 'qwen',
    label: 'Qwen3 32B',
    gateway: 'openrouter',
    defaultModel: 'qwen/qwen3-32b:free',
    supportsSystemRole: true,
    temperature: 0.7,
    maxTokens: 2000,
    description: 'Modèle multilingue de 32 milliards de paramètres',
  },
  mistral: {
    id: 'mistral',
    label: 'Mistral 7B Instruct',
    gateway: 'huggingface',
    defaultModel: 'mistralai/Mistral-7B-Instruct-v0.3',
    supportsSystemRole: false,
    temperature: 0.7,
    maxTokens: 1000,
    description: 'Raisonnement sur documents scientifiques, réponses structurées en français',
  },
  zephyr: {
    id: 'zephyr',
    label: 'Zephyr 7B beta',
    gateway: 'huggingface',
    defaultModel: 'HuggingFaceH4/zephyr-7b-beta',
    supportsSystemRole: false,
    temperature: 0.7,
    maxTokens: 1000,
    description: 'Bonne compréhension des instructions, précision factuelle solide',
  },
  openai: {
    id: 'openai',
    label: 'OpenAI',
    gateway: 'openai',
    defaultModel: 'gpt-4o',
    modelConfigKey: 'OPENAI_CHAT_MODEL',
    supportsSystemRole: true,
    temperature: 0.3,
    maxTokens: 2000,
    description: 'OpenAI chat model',
  },
  google: {
    id: 'google',
    label: 'Google Gemini',
    gateway: 'google',
    defaultModel: 'gemini-2.5-flash-lite',
    modelConfigKey: 'GOOGLE_CHAT_MODEL',
    supportsSystemRole: true,
    temperature: 0.3,
    maxTokens: 2000,
    description: 'Google Gemini chat model',
  },
  anthropic: {
    id: 'anthropic',
    label: 'Anthropic Claude',
    gateway: 'anthropic',
    defaultModel: 'claude-sonnet-4-5-20250929',
    modelConfigKey: 'ANTHROPIC_CHAT_MODEL',
    supportsSystemRole: true,
    temperature: 0.3,
    maxTokens: 2000,
    description: 'Anthropic Claude chat model',
  },
  ollama: {
    id: 'ollama',
    label: 'Ollama (local)',
    gateway: 'ollama',
    defaultModel: 'gemma3:1b',
    modelConfigKey: 'OLLAMA_CHAT_MODEL',
    supportsSystemRole: true,
    temperature: 0.3,
    maxTokens: 2000,
    description: 'Local model served by Ollama',
  },
};
