export type Provider = 'openai' | 'google';

export const MODEL_NAMES = ['gemini/gemini-2.5-flash-lite', 'openai/gpt-5-mini'] as const;

export type ModelName = (typeof MODEL_NAMES)[number];

export const DEFAULT_MODEL: ModelName = 'gemini/gemini-2.5-flash-lite';

export interface ModelEntry {
  provider: Provider;
  /** Model id sent to the provider's chat-completions endpoint */
  callName: string;
  /** Model id recorded on trace generations */
  traceName: string;
}

const MODELS: Record<ModelName, ModelEntry> = {
  'gemini/gemini-2.5-flash-lite': {
    provider: 'google',
    callName: 'gemini-2.5-flash-lite',
    traceName: 'google/gemini-2.5-flash-lite',
  },
  'openai/gpt-5-mini': {
    provider: 'openai',
    callName: 'gpt-5-mini',
    traceName: 'openai/gpt-5-mini',
  },
};

export const PROVIDER_ENDPOINTS: Record<Provider, { baseURL?: string; apiKeyVariable: string }> = {
  openai: { apiKeyVariable: 'OPENAI_API_KEY' },
  // Gemini through Google's OpenAI-compatible endpoint
  google: {
    baseURL: 'https://generativelanguage.googleapis.com/v1beta/openai/',
    apiKeyVariable: 'GEMINI_API_KEY',
  },
};

export function getModel(model: ModelName): ModelEntry {
  return MODELS[model];
}
