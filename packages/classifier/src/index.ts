import type { RelevanceClassifier } from '@jobwatch/posting-sdk';
import { createOllamaClassifier, createOpenRouterClassifier, type ModelClassifierOptions } from './providers.js';

export type ClassifierProvider = 'ollama' | 'openrouter';

export interface ClassifierConfig extends ModelClassifierOptions {
  provider: ClassifierProvider;
}

export function createRelevanceClassifier(config: ClassifierConfig): RelevanceClassifier {
  switch (config.provider) {
    case 'ollama':
      return createOllamaClassifier(config);
    case 'openrouter':
      return createOpenRouterClassifier(config);
  }
}

export {
  createOllamaClassifier,
  createOpenRouterClassifier,
  DEFAULT_OLLAMA_BASE_URL,
  DEFAULT_OPENROUTER_BASE_URL,
} from './providers.js';
export type { ModelClassifierOptions } from './providers.js';
export { LlmClient, ClassifierHttpError } from './client.js';
export type { LlmClientOptions } from './client.js';
export { parseRelevanceLabel } from './label.js';
export { DEFAULT_PROMPT_TEMPLATE, MAX_DESCRIPTION_LENGTH, renderPrompt } from './prompt.js';
