/**
 * Health and configuration API
 */

import type { RequestFn } from './client';
import type { HealthCheckResponse, WebConfig } from '../types';

export interface ConfigApi {
  /** Check web service health */
  health: () => Promise<HealthCheckResponse>;

  /** Get the page configuration derived from the server environment */
  get: () => Promise<WebConfig>;
}

export function createConfigApi(request: RequestFn): ConfigApi {
  return {
    health: () => request<HealthCheckResponse>('/api/health'),

    get: () => request<WebConfig>('/api/config'),
  };
}
