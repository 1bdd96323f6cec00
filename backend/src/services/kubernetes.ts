import fs from 'fs';
import path from 'path';
import * as k8s from '@kubernetes/client-node';
import * as yaml from 'js-yaml';
import type { PodPhase } from '@coldstart/shared';
import { getStatusCode } from '../lib/errors';
import { manifestFileSchema } from '../lib/validation';
import logger from '../lib/logger';

const LAST_APPLIED_ANNOTATION = 'kubectl.kubernetes.io/last-applied-configuration';

/**
 * Container state reduced to what the measurement needs
 */
export interface ContainerSnapshot {
  name: string;
  state: 'waiting' | 'running' | 'terminated' | 'unknown';
  startedAt?: number;            // Epoch seconds, set while running
  ready: boolean;
  reason?: string;               // Waiting/terminated reason, e.g. ImagePullBackOff
}

/**
 * Point-in-time view of a pod. Timestamps are integer epoch seconds.
 */
export interface PodSnapshot {
  name: string;
  phase: PodPhase;
  nodeName?: string;
  creationTime?: number;
  scheduledTime?: number;        // PodScheduled condition transition
  terminating: boolean;          // deletionTimestamp is set
  ready: boolean;                // Ready condition is True
  containers: ContainerSnapshot[];
}

export interface ClusterEvent {
  reason: string;
  message: string;
  firstTimestamp?: number;
  involvedObjectName?: string;
}

/**
 * The cluster operations the harness consumes. Reads are side-effect free;
 * only the measurement run and the cache reset controller call the mutators.
 */
export interface ClusterClient {
  applyManifest(file: string): Promise<void>;
  deleteManifest(file: string): Promise<void>;
  deleteDeployments(selector: string): Promise<void>;
  listPods(selector: string): Promise<PodSnapshot[]>;
  getPod(name: string): Promise<PodSnapshot | null>;
  readLogs(podName: string, container?: string): Promise<string>;
  listEvents(podName?: string): Promise<ClusterEvent[]>;
  listNodes(selector: string): Promise<string[]>;
  deleteNode(name: string): Promise<void>;
}

const POD_PHASES: readonly PodPhase[] = ['Pending', 'Running', 'Succeeded', 'Failed', 'Unknown'];

function isPodPhase(value: string | undefined): value is PodPhase {
  return POD_PHASES.some((phase) => phase === value);
}

/**
 * Convert an API timestamp to integer epoch seconds
 */
export function toEpochSeconds(value: Date | string | undefined | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const ms = value instanceof Date ? value.getTime() : Date.parse(value);
  return Number.isNaN(ms) ? undefined : Math.floor(ms / 1000);
}

function toContainerSnapshot(status: k8s.V1ContainerStatus): ContainerSnapshot {
  const state = status.state;
  if (state?.running) {
    return {
      name: status.name,
      state: 'running',
      startedAt: toEpochSeconds(state.running.startedAt),
      ready: status.ready,
    };
  }
  if (state?.terminated) {
    return { name: status.name, state: 'terminated', ready: status.ready, reason: state.terminated.reason };
  }
  if (state?.waiting) {
    return { name: status.name, state: 'waiting', ready: status.ready, reason: state.waiting.reason };
  }
  return { name: status.name, state: 'unknown', ready: status.ready };
}

export function toPodSnapshot(pod: k8s.V1Pod): PodSnapshot {
  const conditions = pod.status?.conditions || [];
  const scheduled = conditions.find((c) => c.type === 'PodScheduled' && c.status === 'True');
  const phase = pod.status?.phase;

  return {
    name: pod.metadata?.name || 'unknown',
    phase: isPodPhase(phase) ? phase : 'Unknown',
    nodeName: pod.spec?.nodeName || undefined,
    creationTime: toEpochSeconds(pod.metadata?.creationTimestamp),
    scheduledTime: toEpochSeconds(scheduled?.lastTransitionTime),
    terminating: Boolean(pod.metadata?.deletionTimestamp),
    ready: conditions.some((c) => c.type === 'Ready' && c.status === 'True'),
    containers: (pod.status?.containerStatuses || []).map(toContainerSnapshot),
  };
}

export function toClusterEvent(event: k8s.CoreV1Event): ClusterEvent {
  return {
    reason: event.reason || '',
    message: event.message || '',
    // Events recorded through events.k8s.io may only carry eventTime
    firstTimestamp: toEpochSeconds(event.firstTimestamp) ?? toEpochSeconds(event.eventTime),
    involvedObjectName: event.involvedObject?.name,
  };
}

function isKubernetesObject(value: unknown): value is k8s.KubernetesObject {
  return typeof value === 'object' && value !== null && 'kind' in value && 'metadata' in value;
}

/**
 * Parse a multi-document manifest, dropping empty documents and defaulting
 * the namespace like `kubectl apply -n`.
 */
export function parseManifest(text: string, namespace: string): k8s.KubernetesObject[] {
  const documents: unknown[] = yaml.loadAll(text);
  return documents.filter(isKubernetesObject).map((spec) => ({
    ...spec,
    metadata: {
      ...spec.metadata,
      namespace: spec.metadata?.namespace || namespace,
    },
  }));
}

function headerFor(spec: k8s.KubernetesObject, namespace: string) {
  const name = spec.metadata?.name;
  if (!name) {
    throw new Error(`Manifest object of kind ${spec.kind} has no metadata.name`);
  }
  return {
    apiVersion: spec.apiVersion,
    kind: spec.kind,
    metadata: { name, namespace: spec.metadata?.namespace || namespace },
  };
}

/**
 * Kubernetes Service
 * Cluster access for the benchmark through @kubernetes/client-node
 */
export class KubernetesService implements ClusterClient {
  private kc: k8s.KubeConfig;
  private coreV1Api: k8s.CoreV1Api;
  private appsV1Api: k8s.AppsV1Api;
  private objectApi: k8s.KubernetesObjectApi;

  constructor(
    private readonly namespace: string,
    private readonly manifestDir: string
  ) {
    this.kc = new k8s.KubeConfig();

    try {
      this.kc.loadFromDefault();
    } catch {
      logger.warn('No kubeconfig found, cluster calls will fail');
    }

    this.coreV1Api = this.kc.makeApiClient(k8s.CoreV1Api);
    this.appsV1Api = this.kc.makeApiClient(k8s.AppsV1Api);
    this.objectApi = k8s.KubernetesObjectApi.makeApiClient(this.kc);
  }

  getCurrentContext(): string {
    return this.kc.getCurrentContext();
  }

  private async loadManifest(file: string): Promise<k8s.KubernetesObject[]> {
    const fileName = manifestFileSchema.parse(file);
    const text = await fs.promises.readFile(path.join(this.manifestDir, fileName), 'utf8');
    return parseManifest(text, this.namespace);
  }

  /**
   * Create or patch every object in the manifest, like `kubectl apply -f`
   */
  async applyManifest(file: string): Promise<void> {
    const specs = await this.loadManifest(file);

    for (const spec of specs) {
      const header = headerFor(spec, this.namespace);
      const annotations = { ...(spec.metadata?.annotations || {}) };
      delete annotations[LAST_APPLIED_ANNOTATION];
      const body: k8s.KubernetesObject = {
        ...spec,
        metadata: { ...spec.metadata, annotations },
      };
      annotations[LAST_APPLIED_ANNOTATION] = JSON.stringify(body);

      let exists = true;
      try {
        await this.objectApi.read(header);
      } catch (error) {
        if (getStatusCode(error) !== 404) {
          throw error;
        }
        exists = false;
      }

      if (exists) {
        await this.objectApi.patch(body);
        logger.info({ kind: spec.kind, name: header.metadata.name }, `Configured ${spec.kind}/${header.metadata.name}`);
      } else {
        await this.objectApi.create(body);
        logger.info({ kind: spec.kind, name: header.metadata.name }, `Created ${spec.kind}/${header.metadata.name}`);
      }
    }
  }

  /**
   * Delete every object in the manifest, ignoring objects that are already gone
   */
  async deleteManifest(file: string): Promise<void> {
    const specs = await this.loadManifest(file);

    for (const spec of specs) {
      const header = headerFor(spec, this.namespace);
      try {
        await this.objectApi.delete(header);
        logger.info({ kind: spec.kind, name: header.metadata.name }, `Deleted ${spec.kind}/${header.metadata.name}`);
      } catch (error) {
        if (getStatusCode(error) !== 404) {
          throw error;
        }
        logger.debug({ kind: spec.kind, name: header.metadata.name }, 'Object already absent');
      }
    }
  }

  async deleteDeployments(selector: string): Promise<void> {
    await this.appsV1Api.deleteCollectionNamespacedDeployment(
      this.namespace,
      undefined,
      undefined,
      undefined,
      undefined,
      undefined,
      selector
    );
    logger.info({ selector, namespace: this.namespace }, `Deleted deployments matching ${selector}`);
  }

  async listPods(selector: string): Promise<PodSnapshot[]> {
    const response = await this.coreV1Api.listNamespacedPod(
      this.namespace,
      undefined,
      undefined,
      undefined,
      undefined,
      selector
    );
    return response.body.items.map(toPodSnapshot);
  }

  async getPod(name: string): Promise<PodSnapshot | null> {
    try {
      const response = await this.coreV1Api.readNamespacedPod(name, this.namespace);
      return toPodSnapshot(response.body);
    } catch (error) {
      if (getStatusCode(error) === 404) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Container logs, or an empty string while the container cannot serve logs yet
   */
  async readLogs(podName: string, container?: string): Promise<string> {
    try {
      const response = await this.coreV1Api.readNamespacedPodLog(podName, this.namespace, container);
      return response.body;
    } catch (error) {
      const statusCode = getStatusCode(error);
      if (statusCode === 400 || statusCode === 404) {
        logger.debug({ podName, container, statusCode }, 'Logs not available yet');
        return '';
      }
      throw error;
    }
  }

  async listEvents(podName?: string): Promise<ClusterEvent[]> {
    const response = await this.coreV1Api.listNamespacedEvent(
      this.namespace,
      undefined,
      undefined,
      undefined,
      podName ? `involvedObject.name=${podName}` : undefined
    );
    return response.body.items.map(toClusterEvent);
  }

  async listNodes(selector: string): Promise<string[]> {
    const response = await this.coreV1Api.listNode(undefined, undefined, undefined, undefined, selector);
    return response.body.items.map((node) => node.metadata?.name || 'unknown');
  }

  async deleteNode(name: string): Promise<void> {
    try {
      await this.coreV1Api.deleteNode(name);
    } catch (error) {
      if (getStatusCode(error) !== 404) {
        throw error;
      }
    }
  }
}
