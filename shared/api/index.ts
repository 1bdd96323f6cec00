/**
 * Shared API client for the chat page
 */

// Re-export client utilities
export { ApiError, createRequestFn } from './client';
export type { ApiClientConfig, RequestFn } from './client';
export { formatGemmaPrompt, modelPathForBucket, DEFAULT_MODEL_NAME } from './completions';

import { createRequestFn, type ApiClientConfig } from './client';
import { createConfigApi, type ConfigApi } from './health';
import { createCompletionsApi, type CompletionsApi } from './completions';

export type { ConfigApi } from './health';
export type { CompletionsApi, CompletionOptions } from './completions';

/**
 * Complete API client with all endpoints
 */
export interface ApiClient {
  config: ConfigApi;
  completions: CompletionsApi;
}

/**
 * Create a fully configured API client
 */
export function createApiClient(config: ApiClientConfig): ApiClient {
  const request = createRequestFn(config);

  return {
    config: createConfigApi(request),
    completions: createCompletionsApi(request),
  };
}
