import type { DeploymentTarget, PhaseTimestampSet, RunRecord } from '@coldstart/shared';
import logger from '../lib/logger';
import { nowSeconds, systemClock, type Clock } from '../lib/poll';
import { TimeoutError } from '../lib/errors';
import type { BenchConsole } from '../lib/console';
import type { ClusterClient, ClusterEvent, PodSnapshot } from './kubernetes';
import { findContainer, type ClusterObserver, type ScheduledPod } from './clusterObserver';
import { extractPhaseDurations } from './logScraper';
import { collectTimestamps, recordPhase, reduce } from './phaseReducer';

export type RunState =
  | 'CLEANUP_PREVIOUS'
  | 'APPLY'
  | 'WAIT_SCHEDULED'
  | 'WAIT_CONTAINER_RUNNING'
  | 'WAIT_APP_READY'
  | 'REDUCE';

export type RunOutcome =
  | { status: 'reported'; record: RunRecord }
  | { status: 'failed'; state: RunState; error: Error };

export const IMAGE_STREAMING_EVENT = 'ImageStreaming';
export const IMAGE_STREAMING_MESSAGE = 'backed by image streaming';

/**
 * Everything a single run has observed so far. Created per target and
 * discarded once the run is reported or fails.
 */
interface RunContext {
  target: DeploymentTarget;
  state: RunState;
  timestamps: PhaseTimestampSet;
  pod?: ScheduledPod;
  runningPod?: PodSnapshot;
  logs: string;
}

export interface MeasurementOptions {
  cluster: ClusterClient;
  observer: ClusterObserver;
  console: BenchConsole;
  gpuNodeSelector: string;
  /** Global switch; a target also has to ask for GPU node deletion */
  deleteGpuNodes: boolean;
  clock?: Clock;
}

export function isImageStreamingEvent(event: ClusterEvent): boolean {
  return event.reason === IMAGE_STREAMING_EVENT && event.message.includes(IMAGE_STREAMING_MESSAGE);
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Drives one deployment target through
 * CLEANUP_PREVIOUS → APPLY → WAIT_SCHEDULED → WAIT_CONTAINER_RUNNING →
 * WAIT_APP_READY → REDUCE, ending reported or failed.
 */
export class MeasurementRunner {
  private readonly clock: Clock;

  constructor(private readonly options: MeasurementOptions) {
    this.clock = options.clock ?? systemClock;
  }

  async run(target: DeploymentTarget): Promise<RunOutcome> {
    const ctx: RunContext = { target, state: 'CLEANUP_PREVIOUS', timestamps: {}, logs: '' };
    const { console: out } = this.options;

    out.phase(`${target.mode}: measuring ${target.manifest}`);
    logger.info({ target: target.id, manifest: target.manifest }, 'Starting measurement run');

    try {
      await this.cleanupPrevious(ctx);
      await this.apply(ctx);
      await this.waitScheduled(ctx);
      await this.waitContainerRunning(ctx);
      await this.waitAppReady(ctx);
      const record = await this.reduce(ctx);
      logger.info({ target: target.id, report: record.report }, 'Measurement run reported');
      return { status: 'reported', record };
    } catch (err) {
      const error = toError(err);
      out.endDots();
      out.error(`${target.mode} run failed during ${ctx.state}: ${error.message}`);
      logger.error({ target: target.id, state: ctx.state, err: error }, 'Measurement run failed');
      return { status: 'failed', state: ctx.state, error };
    }
  }

  /**
   * Remove a previous deployment of the target and wait until its pods are
   * gone. The wait is best-effort: pods still terminating when it times out
   * are left to the stale-pod filter. Also used on its own to pre-clean
   * before a suite.
   */
  async cleanup(target: DeploymentTarget): Promise<void> {
    const { cluster, observer, console: out } = this.options;

    out.step(`Removing previous ${target.mode} workload (${target.selector})`);
    await cluster.deleteManifest(target.manifest);
    await cluster.deleteDeployments(target.selector);
    try {
      await observer.waitForPodsDeleted(target.selector);
    } catch (err) {
      if (!(err instanceof TimeoutError)) {
        throw err;
      }
      out.endDots();
      out.warning(`Pods ${target.selector} still terminating after ${Math.round(err.elapsedMs / 1000)}s; continuing`);
      logger.warn({ target: target.id, selector: target.selector, elapsedMs: err.elapsedMs }, 'Previous pods not gone, continuing');
      return;
    }
    out.endDots();
  }

  private async cleanupPrevious(ctx: RunContext): Promise<void> {
    const { cluster, observer, console: out, gpuNodeSelector, deleteGpuNodes } = this.options;
    ctx.state = 'CLEANUP_PREVIOUS';

    await this.cleanup(ctx.target);

    if (!ctx.target.deleteGpuNodes || !deleteGpuNodes) {
      return;
    }

    const nodes = await cluster.listNodes(gpuNodeSelector);
    if (nodes.length === 0) {
      return;
    }

    out.step(`Deleting ${nodes.length} GPU node(s) to force a cold start`);
    for (const node of nodes) {
      await cluster.deleteNode(node);
    }
    await observer.waitForNodesRemoved(gpuNodeSelector);
    out.endDots();
    logger.info({ nodes }, 'GPU nodes removed');
  }

  private async apply(ctx: RunContext): Promise<void> {
    ctx.state = 'APPLY';
    ctx.timestamps = recordPhase(ctx.timestamps, 'applyTime', nowSeconds(this.clock));
    this.options.console.step(`Applying ${ctx.target.manifest}`);
    await this.options.cluster.applyManifest(ctx.target.manifest);
  }

  private async waitScheduled(ctx: RunContext): Promise<void> {
    const { observer, console: out } = this.options;
    ctx.state = 'WAIT_SCHEDULED';

    out.step('Waiting for the pod to be scheduled');
    ctx.pod = await observer.waitForScheduled(ctx.target.selector);
    ctx.timestamps = recordPhase(ctx.timestamps, 'creationTime', ctx.pod.creationTime);
    ctx.timestamps = recordPhase(ctx.timestamps, 'scheduledTime', ctx.pod.scheduledTime);
    out.endDots();
    out.success(`Pod ${ctx.pod.name} scheduled on ${ctx.pod.nodeName}`);
  }

  private async waitContainerRunning(ctx: RunContext): Promise<void> {
    const { observer, console: out } = this.options;
    ctx.state = 'WAIT_CONTAINER_RUNNING';
    const pod = this.requirePod(ctx);

    out.step('Waiting for the container to start (image pull)');
    ctx.runningPod = await observer.waitForContainerRunning(pod.name, ctx.target.container);
    ctx.timestamps = recordPhase(
      ctx.timestamps,
      'containerRunningTime',
      findContainer(ctx.runningPod, ctx.target.container)?.startedAt
    );
    out.endDots();
    out.success('Container running');
  }

  private async waitAppReady(ctx: RunContext): Promise<void> {
    const { observer, console: out } = this.options;
    ctx.state = 'WAIT_APP_READY';
    const pod = this.requirePod(ctx);

    out.step('Waiting for the application to be ready');
    const ready = await observer.waitForAppReady(pod.name, ctx.target.readiness, ctx.target.container);
    ctx.timestamps = recordPhase(ctx.timestamps, 'appReadyTime', nowSeconds(this.clock));
    ctx.logs = ready.logs;
    out.endDots();
    out.success('Application ready');
  }

  private async reduce(ctx: RunContext): Promise<RunRecord> {
    const { cluster } = this.options;
    ctx.state = 'REDUCE';
    const scheduled = this.requirePod(ctx);

    // Only fills what the waits left unset; recorded facts are never replaced
    const pod = (await cluster.getPod(scheduled.name)) ?? ctx.runningPod ?? scheduled;
    const events = await cluster.listEvents(pod.name);
    ctx.timestamps = collectTimestamps(ctx.timestamps, pod, events, ctx.target.container);

    const record: RunRecord = {
      targetId: ctx.target.id,
      mode: ctx.target.mode,
      podName: pod.name,
      nodeName: pod.nodeName ?? scheduled.nodeName,
      report: reduce(ctx.timestamps, extractPhaseDurations(ctx.logs)),
    };

    if (ctx.target.verifyImageStreaming) {
      record.imageStreamingConfirmed = (await cluster.listEvents()).some(isImageStreamingEvent);
    }

    return record;
  }

  private requirePod(ctx: RunContext): ScheduledPod {
    if (!ctx.pod) {
      throw new Error(`No scheduled pod recorded before ${ctx.state}`);
    }
    return ctx.pod;
  }
}
