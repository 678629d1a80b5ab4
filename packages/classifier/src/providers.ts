import type { RawPosting, RelevanceClassifier, RelevanceLabel } from '@jobwatch/posting-sdk';
import { z } from 'zod';
import { LlmClient, type LlmClientOptions } from './client.js';
import { parseRelevanceLabel } from './label.js';
import { DEFAULT_PROMPT_TEMPLATE, renderPrompt } from './prompt.js';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
export const DEFAULT_OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

const ollamaResponseSchema = z.object({
  response: z.string(),
});

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
});

export interface ModelClassifierOptions extends Omit<LlmClientOptions, 'baseUrl'> {
  model: string;
  searchTerm: string;
  baseUrl?: string;
  promptTemplate?: string;
}

/**
 * Local model served by Ollama (`POST /api/generate`, non-streaming).
 */
export function createOllamaClassifier(options: ModelClassifierOptions): RelevanceClassifier {
  const client = new LlmClient({ ...options, baseUrl: options.baseUrl ?? DEFAULT_OLLAMA_BASE_URL });
  const template = options.promptTemplate ?? DEFAULT_PROMPT_TEMPLATE;

  return {
    async classify(posting: RawPosting): Promise<RelevanceLabel> {
      const payload = await client.postJson('/api/generate', {
        model: options.model,
        prompt: renderPrompt(template, posting, options.searchTerm),
        stream: false,
        options: { temperature: 0 },
      });

      return parseRelevanceLabel(ollamaResponseSchema.parse(payload).response);
    },
  };
}

/**
 * Remote model through OpenRouter's OpenAI-compatible chat completions endpoint.
 */
export function createOpenRouterClassifier(options: ModelClassifierOptions): RelevanceClassifier {
  if (!options.apiKey) {
    throw new Error('OpenRouter classifier requires an API key');
  }

  const client = new LlmClient({ ...options, baseUrl: options.baseUrl ?? DEFAULT_OPENROUTER_BASE_URL });
  const template = options.promptTemplate ?? DEFAULT_PROMPT_TEMPLATE;

  return {
    async classify(posting: RawPosting): Promise<RelevanceLabel> {
      const payload = await client.postJson('/chat/completions', {
        model: options.model,
        messages: [{ role: 'user', content: renderPrompt(template, posting, options.searchTerm) }],
        temperature: 0,
      });

      const [choice] = chatCompletionSchema.parse(payload).choices;
      return parseRelevanceLabel(choice?.message.content ?? '');
    },
  };
}
