/**
 * Completions API (proxied to the inference server under /v1)
 */

import type { RequestFn } from './client';
import type { CompletionRequest, CompletionResponse } from '../types';

export const DEFAULT_MODEL_NAME = 'gemma-3-12b-it';

export interface CompletionOptions {
  model: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

export interface CompletionsApi {
  /** Request a single non-streaming completion and return its text */
  complete: (options: CompletionOptions) => Promise<string>;
}

/**
 * Wrap a user prompt in Gemma instruct turn markers
 */
export function formatGemmaPrompt(prompt: string): string {
  return `<start_of_turn>user\n${prompt}<end_of_turn>\n<start_of_turn>model\n`;
}

/**
 * Model path inside the weights bucket, empty when no bucket is configured
 */
export function modelPathForBucket(bucketName: string, modelName = DEFAULT_MODEL_NAME): string {
  return bucketName ? `gs://${bucketName}/${modelName}` : '';
}

export function createCompletionsApi(request: RequestFn): CompletionsApi {
  return {
    complete: async (options) => {
      const body: CompletionRequest = {
        model: options.model,
        prompt: formatGemmaPrompt(options.prompt),
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        stream: false,
      };

      const response = await request<CompletionResponse>('/v1/completions', {
        method: 'POST',
        body: JSON.stringify(body),
      });

      return response.choices[0]?.text ?? '';
    },
  };
}
