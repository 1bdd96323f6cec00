import type { DeploymentTarget, TargetId } from '@coldstart/shared';

export const APP_READY_MARKER = 'Application startup complete';

export const RESET_CACHE_MANIFEST = 'reset-cache.yaml';
export const IMAGE_CLEANER_SELECTOR = 'app=image-cleaner';

/**
 * Workloads the harness knows how to measure. The vLLM targets wait for the
 * server's startup log line; the large-image targets wait for pod readiness.
 */
export const TARGETS: Record<TargetId, DeploymentTarget> = {
  standard: {
    id: 'standard',
    mode: 'Standard',
    manifest: 'vllm-deployment.yaml',
    selector: 'app=model-server',
    container: 'inference-server',
    readiness: { kind: 'logMarker', marker: APP_READY_MARKER },
    deleteGpuNodes: true,
    verifyImageStreaming: false,
  },
  runai: {
    id: 'runai',
    mode: 'RunAI',
    manifest: 'vllm-deployment-runai.yaml',
    selector: 'app=model-server-runai',
    container: 'vllm-container',
    readiness: { kind: 'logMarker', marker: APP_READY_MARKER },
    deleteGpuNodes: true,
    verifyImageStreaming: false,
  },
  'standard-pull': {
    id: 'standard-pull',
    mode: 'Standard',
    manifest: 'pod-standard.yaml',
    selector: 'app=large-image-standard',
    readiness: { kind: 'podReady' },
    deleteGpuNodes: false,
    verifyImageStreaming: false,
  },
  streaming: {
    id: 'streaming',
    mode: 'Streaming',
    manifest: 'pod-streaming.yaml',
    selector: 'app=large-image-streaming',
    readiness: { kind: 'podReady' },
    deleteGpuNodes: false,
    verifyImageStreaming: true,
  },
};

export function getTarget(id: TargetId): DeploymentTarget {
  return TARGETS[id];
}
