import { createApiClient } from '@coldstart/shared/api'

// API Base URL - when not specified, use relative URL (same origin)
// In development VITE_API_URL points at the chat server (http://localhost:3000)
const API_BASE = import.meta.env.VITE_API_URL || ''

const client = createApiClient({ baseUrl: API_BASE })

export const configApi = client.config
export const completionsApi = client.completions

export { ApiError, modelPathForBucket, DEFAULT_MODEL_NAME } from '@coldstart/shared/api'
export type { CompletionOptions } from '@coldstart/shared/api'
export type { WebConfig } from '@coldstart/shared'
