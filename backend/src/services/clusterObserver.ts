import type { Readiness } from '@coldstart/shared';
import { awaitCondition, type Clock } from '../lib/poll';
import { PodFailedError } from '../lib/errors';
import type { ClusterClient, ContainerSnapshot, PodSnapshot } from './kubernetes';
import type { PollIntervals, Timeouts } from './config';
import { hasReadyMarker } from './logScraper';

export type ScheduledPod = PodSnapshot & { nodeName: string };

export interface AppReadyState {
  ready: boolean;
  logs: string;
}

export interface ObserverOptions {
  intervals: PollIntervals;
  timeouts: Timeouts;
  clock?: Clock;
  /** Progress hook, called after every poll that did not satisfy its condition */
  onPoll?: (attempt: number) => void;
}

/**
 * Most recently created pod that is not being deleted. While a deployment is
 * replaced, the old pod lingers in Terminating next to the new Pending one.
 */
export function selectLatestPod(pods: PodSnapshot[]): PodSnapshot | undefined {
  const candidates = pods.filter((pod) => !pod.terminating);
  let latest: PodSnapshot | undefined;
  for (const pod of candidates) {
    if (!latest || (pod.creationTime ?? -Infinity) >= (latest.creationTime ?? -Infinity)) {
      latest = pod;
    }
  }
  return latest;
}

/**
 * Named container, or the first one when no name is given
 */
export function findContainer(pod: PodSnapshot, container?: string): ContainerSnapshot | undefined {
  return container ? pod.containers.find((c) => c.name === container) : pod.containers[0];
}

function isScheduled(pod: PodSnapshot | undefined): pod is ScheduledPod {
  return Boolean(pod?.nodeName);
}

function failIfTerminal(pod: PodSnapshot | null): PodSnapshot | null {
  if (pod?.phase === 'Failed') {
    throw new PodFailedError(pod.name, pod);
  }
  return pod;
}

/**
 * Cluster Observer
 * Read-only waits over cluster state. Every wait has its own interval and
 * timeout and fails with TimeoutError when the bound elapses.
 */
export class ClusterObserver {
  constructor(
    private readonly cluster: ClusterClient,
    private readonly options: ObserverOptions
  ) {}

  private pollOptions(description: string, intervalMs: number, timeoutMs: number) {
    return {
      description,
      intervalMs,
      timeoutMs,
      clock: this.options.clock,
      onPoll: this.options.onPoll,
    };
  }

  /**
   * Latest non-terminating pod for the selector, once a node is assigned
   */
  async waitForScheduled(selector: string): Promise<ScheduledPod> {
    const { intervals, timeouts } = this.options;
    return awaitCondition(
      async () => selectLatestPod(await this.cluster.listPods(selector)),
      isScheduled,
      this.pollOptions(`pod ${selector} to be scheduled`, intervals.scheduleMs, timeouts.scheduleMs)
    );
  }

  /**
   * Pod once its container reports running. Image pulling happens here.
   */
  async waitForContainerRunning(podName: string, container?: string): Promise<PodSnapshot> {
    const { intervals, timeouts } = this.options;
    return awaitCondition(
      async () => failIfTerminal(await this.cluster.getPod(podName)),
      (pod: PodSnapshot | null): pod is PodSnapshot => pod !== null && findContainer(pod, container)?.state === 'running',
      this.pollOptions(
        `container ${container || '(first)'} in pod ${podName} to run`,
        intervals.containerStartMs,
        timeouts.containerStartMs
      )
    );
  }

  /**
   * Application readiness: the startup marker in the container log, or the
   * pod Ready condition. A Failed pod ends the wait with PodFailedError.
   */
  async waitForAppReady(podName: string, readiness: Readiness, container?: string): Promise<AppReadyState> {
    const { intervals, timeouts } = this.options;

    if (readiness.kind === 'logMarker') {
      const marker = readiness.marker;
      return awaitCondition(
        async (): Promise<AppReadyState> => {
          const logs = await this.cluster.readLogs(podName, container);
          if (hasReadyMarker(logs, marker)) {
            return { ready: true, logs };
          }
          failIfTerminal(await this.cluster.getPod(podName));
          return { ready: false, logs };
        },
        (state) => state.ready,
        this.pollOptions(`"${marker}" in ${podName} logs`, intervals.appReadyMs, timeouts.appReadyMs)
      );
    }

    return awaitCondition(
      async (): Promise<AppReadyState> => {
        const pod = failIfTerminal(await this.cluster.getPod(podName));
        return { ready: pod?.ready ?? false, logs: '' };
      },
      (state) => state.ready,
      this.pollOptions(`pod ${podName} to be Ready`, intervals.podReadyMs, timeouts.podReadyMs)
    );
  }

  async waitForPodsDeleted(selector: string): Promise<void> {
    const { intervals, timeouts } = this.options;
    await awaitCondition(
      () => this.cluster.listPods(selector),
      (pods) => pods.length === 0,
      this.pollOptions(`pods ${selector} to terminate`, intervals.cleanupMs, timeouts.cleanupMs)
    );
  }

  async waitForNodesRemoved(selector: string): Promise<void> {
    const { intervals, timeouts } = this.options;
    await awaitCondition(
      () => this.cluster.listNodes(selector),
      (nodes) => nodes.length === 0,
      this.pollOptions(`nodes ${selector} to be removed`, intervals.nodeRemovalMs, timeouts.nodeRemovalMs)
    );
  }

  /**
   * At least one pod matches and every matching pod is Ready
   */
  async waitForPodsReady(selector: string, timeoutMs: number): Promise<PodSnapshot[]> {
    return awaitCondition(
      () => this.cluster.listPods(selector),
      (pods) => pods.length > 0 && pods.every((pod) => pod.ready),
      this.pollOptions(`pods ${selector} to be Ready`, this.options.intervals.cacheResetMs, timeoutMs)
    );
  }
}
