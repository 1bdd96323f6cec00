import path from 'path';
import { z } from 'zod';
import { labelSelectorSchema, namespaceSchema } from '../lib/validation';

const seconds = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : defaultValue))
    .pipe(z.number().int().positive());

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .optional()
    .transform((val) => (val === undefined ? defaultValue : val === 'true'));

/**
 * Environment variables read by the benchmark CLI and the web service
 */
export const envSchema = z.object({
  BENCH_NAMESPACE: namespaceSchema.default('default'),
  MANIFEST_DIR: z.string().min(1).default('./manifests'),
  GPU_NODE_SELECTOR: labelSelectorSchema.default('cloud.google.com/compute-class=l4'),
  DELETE_GPU_NODES: booleanFlag(true),
  CLEANUP_TIMEOUT: seconds(120),
  NODE_REMOVAL_TIMEOUT: seconds(900),
  SCHEDULE_TIMEOUT: seconds(1800),
  CONTAINER_START_TIMEOUT: seconds(1800),
  APP_READY_TIMEOUT: seconds(1800),
  POD_READY_TIMEOUT: seconds(600),
  CACHE_RESET_TIMEOUT: seconds(60),
  PORT: z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : 3000))
    .pipe(z.number().int().min(1).max(65535)),
  INFERENCE_URL: z.string().url().default('http://localhost:8080/v1'),
  BUCKET_NAME: z.string().default(''),
  CORS_ORIGIN: z.string().default('*'),
});

export interface Timeouts {
  cleanupMs: number;
  nodeRemovalMs: number;
  scheduleMs: number;
  containerStartMs: number;
  appReadyMs: number;
  podReadyMs: number;
  cacheResetMs: number;
}

export interface PollIntervals {
  cleanupMs: number;
  nodeRemovalMs: number;
  scheduleMs: number;
  containerStartMs: number;
  appReadyMs: number;
  podReadyMs: number;
  cacheResetMs: number;
}

export interface BenchConfig {
  namespace: string;
  manifestDir: string;
  gpuNodeSelector: string;
  deleteGpuNodes: boolean;
  timeouts: Timeouts;
  intervals: PollIntervals;
  web: {
    port: number;
    inferenceUrl: string;
    bucketName: string;
    corsOrigin: string;
  };
}

export const DEFAULT_INTERVALS: PollIntervals = {
  cleanupMs: 2000,
  nodeRemovalMs: 5000,
  scheduleMs: 2000,
  containerStartMs: 2000,
  appReadyMs: 10000,
  podReadyMs: 2000,
  cacheResetMs: 2000,
};

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join(', ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse and validate configuration from environment variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): BenchConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(issues);
  }

  const parsed = result.data;
  return {
    namespace: parsed.BENCH_NAMESPACE,
    manifestDir: path.resolve(parsed.MANIFEST_DIR),
    gpuNodeSelector: parsed.GPU_NODE_SELECTOR,
    deleteGpuNodes: parsed.DELETE_GPU_NODES,
    timeouts: {
      cleanupMs: parsed.CLEANUP_TIMEOUT * 1000,
      nodeRemovalMs: parsed.NODE_REMOVAL_TIMEOUT * 1000,
      scheduleMs: parsed.SCHEDULE_TIMEOUT * 1000,
      containerStartMs: parsed.CONTAINER_START_TIMEOUT * 1000,
      appReadyMs: parsed.APP_READY_TIMEOUT * 1000,
      podReadyMs: parsed.POD_READY_TIMEOUT * 1000,
      cacheResetMs: parsed.CACHE_RESET_TIMEOUT * 1000,
    },
    intervals: { ...DEFAULT_INTERVALS },
    web: {
      port: parsed.PORT,
      inferenceUrl: parsed.INFERENCE_URL.replace(/\/+$/, ''),
      bucketName: parsed.BUCKET_NAME,
      corsOrigin: parsed.CORS_ORIGIN,
    },
  };
}
