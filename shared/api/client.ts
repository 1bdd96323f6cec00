/**
 * Shared API client for the chat page
 *
 * Works in the browser (same-origin requests) and in tests, where a custom
 * fetch implementation stands in for the web service.
 *
 * Usage:
 * ```typescript
 * const client = createApiClient({ baseUrl: '' });
 *
 * const { bucketName } = await client.config.get();
 * ```
 */

/**
 * Configuration for the API client
 */
export interface ApiClientConfig {
  /**
   * Base URL for requests (e.g., 'http://localhost:3000' or '')
   * Empty string means same-origin requests
   */
  baseUrl: string;

  /**
   * Optional custom fetch implementation (for testing or special environments)
   */
  fetchImpl?: typeof fetch;
}

/**
 * API Error with status code information
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

function messageFromBody(body: unknown): string | undefined {
  if (!body || typeof body !== 'object') {
    return undefined;
  }
  if ('error' in body && body.error && typeof body.error === 'object' && 'message' in body.error) {
    return typeof body.error.message === 'string' ? body.error.message : undefined;
  }
  if ('message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return undefined;
}

/**
 * Creates a request function configured with the given options.
 * Paths are absolute (`/api/config`, `/v1/completions`).
 */
export function createRequestFn(config: ApiClientConfig) {
  return async function request<T>(
    path: string,
    options?: RequestInit
  ): Promise<T> {
    // Resolved per call so a fetch patched after startup is picked up
    const fetchFn = config.fetchImpl || fetch;
    const url = `${config.baseUrl}${path}`;

    const response = await fetchFn(url, {
      ...options,
      headers: {
        'Content-Type': 'application/json',
        ...(options?.headers || {}),
      },
    });

    if (!response.ok) {
      // The proxy may answer with JSON or plain text
      const text = await response.text();
      let errorMessage: string;
      try {
        errorMessage = messageFromBody(JSON.parse(text)) || text;
      } catch {
        errorMessage = text;
      }
      throw new ApiError(
        response.status,
        `${response.statusText || `Request failed with status ${response.status}`} - ${errorMessage || 'No response body'}`
      );
    }

    return response.json();
  };
}

/**
 * Type for the request function
 */
export type RequestFn = ReturnType<typeof createRequestFn>;
