import { beforeAll, describe, test, expect } from 'vitest';
import chalk from 'chalk';
import { MeasurementRunner, isImageStreamingEvent } from './measurement';
import { ClusterObserver } from './clusterObserver';
import { DEFAULT_INTERVALS, type Timeouts } from './config';
import { TARGETS } from './targets';
import { createConsole } from '../lib/console';
import { PodFailedError } from '../lib/errors';
import { FakeCluster, createFakeClock, createPod } from '../test/fakes';

const GPU_SELECTOR = 'cloud.google.com/compute-class=l4';

const TIMEOUTS: Timeouts = {
  cleanupMs: 10_000,
  nodeRemovalMs: 60_000,
  scheduleMs: 60_000,
  containerStartMs: 60_000,
  appReadyMs: 60_000,
  podReadyMs: 60_000,
  cacheResetMs: 10_000,
};

function createRunner(cluster: FakeCluster, deleteGpuNodes = true) {
  const clock = createFakeClock(1_000_000);
  let output = '';
  const out = createConsole({ write: (text) => (output += text) });
  const observer = new ClusterObserver(cluster, {
    intervals: DEFAULT_INTERVALS,
    timeouts: TIMEOUTS,
    clock,
    onPoll: () => out.dot(),
  });
  const runner = new MeasurementRunner({
    cluster,
    observer,
    console: out,
    gpuNodeSelector: GPU_SELECTOR,
    deleteGpuNodes,
    clock,
  });
  return { runner, clock, lines: () => output.split('\n') };
}

const runningPod = createPod({
  name: 'model-server-new',
  phase: 'Running',
  nodeName: 'gpu-node-a',
  creationTime: 1006,
  scheduledTime: 1007,
  containers: [{ name: 'inference-server', state: 'running', startedAt: 1012, ready: true }],
});

function scriptStandardRun(cluster: FakeCluster) {
  cluster.podLists.set('app=model-server', [
    [],
    [createPod({ name: 'model-server-new', creationTime: 1006 })],
    [runningPod],
  ]);
  cluster.nodeLists.set(GPU_SELECTOR, [['gpu-1'], ['gpu-1'], []]);
  cluster.pods.set('model-server-new', [runningPod]);
  cluster.logs.set('model-server-new', [
    'Loading weights took 4.5 seconds',
    'Loading weights took 4.5 seconds\nINFO:     Application startup complete.',
  ]);
  cluster.events = [
    { reason: 'Pulling', message: 'Pulling image "vllm"', firstTimestamp: 1008, involvedObjectName: 'model-server-new' },
    { reason: 'Pulled', message: 'Successfully pulled image', firstTimestamp: 1010, involvedObjectName: 'model-server-new' },
    { reason: 'Pulling', message: 'Pulling image "vllm"', firstTimestamp: 900, involvedObjectName: 'model-server-old' },
  ];
}

beforeAll(() => {
  chalk.level = 0;
});

describe('MeasurementRunner', () => {
  test('measures a cold start from apply to the startup log line', async () => {
    const cluster = new FakeCluster();
    scriptStandardRun(cluster);
    const { runner, lines } = createRunner(cluster);

    const outcome = await runner.run(TARGETS.standard);

    expect(outcome).toEqual({
      status: 'reported',
      record: {
        targetId: 'standard',
        mode: 'Standard',
        podName: 'model-server-new',
        nodeName: 'gpu-node-a',
        report: {
          nodeProvisioning: 1,
          imagePull: 2,
          imagePullObserved: true,
          runtimeStartup: 3,
          totalWallClock: 12,
          subPhases: { weightLoad: 4.5, compile: 0, graphCapture: 0 },
          anomalies: [],
        },
      },
    });
    expect(cluster.calls).toEqual([
      'delete vllm-deployment.yaml',
      'delete deployments app=model-server',
      'delete node gpu-1',
      'apply vllm-deployment.yaml',
    ]);
    expect(lines()).toContain('Pod model-server-new scheduled on gpu-node-a');
  });

  test('skips GPU node deletion when disabled globally', async () => {
    const cluster = new FakeCluster();
    scriptStandardRun(cluster);
    const { runner } = createRunner(cluster, false);

    const outcome = await runner.run(TARGETS.standard);

    expect(outcome.status).toBe('reported');
    expect(cluster.calls).not.toContain('delete node gpu-1');
  });

  test('carries on when previous pods outlive the cleanup wait', async () => {
    const cluster = new FakeCluster();
    scriptStandardRun(cluster);
    const stalePod = createPod({
      name: 'model-server-old',
      phase: 'Running',
      nodeName: 'gpu-node-z',
      creationTime: 900,
      terminating: true,
    });
    cluster.podLists.set('app=model-server', [[stalePod], [stalePod, runningPod]]);
    const { runner, lines } = createRunner(cluster, false);

    const outcome = await runner.run(TARGETS.standard);

    expect(outcome).toMatchObject({ status: 'reported', record: { podName: 'model-server-new' } });
    expect(lines()).toContain('Pods app=model-server still terminating after 10s; continuing');
    expect(cluster.calls).toContain('apply vllm-deployment.yaml');
  });

  test('keeps observed timestamps when the container restarts before the report', async () => {
    const cluster = new FakeCluster();
    scriptStandardRun(cluster);
    const restarted = createPod({
      name: 'model-server-new',
      phase: 'Running',
      nodeName: 'gpu-node-a',
      creationTime: 1006,
      scheduledTime: 1007,
      containers: [{ name: 'inference-server', state: 'waiting', reason: 'CrashLoopBackOff', ready: false }],
    });
    cluster.pods.set('model-server-new', [runningPod, restarted]);
    const { runner } = createRunner(cluster);

    const outcome = await runner.run(TARGETS.standard);

    expect(outcome).toMatchObject({
      status: 'reported',
      record: {
        report: { nodeProvisioning: 1, imagePull: 2, runtimeStartup: 3, totalWallClock: 12, anomalies: [] },
      },
    });
  });

  test('fails in APPLY when the manifest cannot be applied', async () => {
    const cluster = new FakeCluster();
    cluster.applyError = new Error('manifest not found');
    const { runner, lines } = createRunner(cluster, false);

    const outcome = await runner.run(TARGETS.runai);

    expect(outcome).toMatchObject({ status: 'failed', state: 'APPLY' });
    expect(lines()).toContain('RunAI run failed during APPLY: manifest not found');
  });

  test('fails in WAIT_CONTAINER_RUNNING when the pod fails', async () => {
    const cluster = new FakeCluster();
    cluster.podLists.set('app=model-server', [[], [createPod({ name: 'p', nodeName: 'n', creationTime: 1 })]]);
    cluster.pods.set('p', [createPod({ name: 'p', phase: 'Failed' })]);
    const { runner } = createRunner(cluster, false);

    const outcome = await runner.run(TARGETS.standard);

    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.state).toBe('WAIT_CONTAINER_RUNNING');
      expect(outcome.error).toBeInstanceOf(PodFailedError);
    }
  });

  test('confirms image streaming from cluster events', async () => {
    const cluster = new FakeCluster();
    const pod = createPod({
      name: 'large-image-streaming',
      phase: 'Running',
      ready: true,
      nodeName: 'node-b',
      creationTime: 1001,
      scheduledTime: 1002,
      containers: [{ name: 'app', state: 'running', startedAt: 1010, ready: true }],
    });
    cluster.podLists.set('app=large-image-streaming', [[], [pod]]);
    cluster.pods.set('large-image-streaming', [pod]);
    cluster.events = [
      {
        reason: 'ImageStreaming',
        message: 'Image us-docker.pkg.dev/demo/large:1 is backed by image streaming.',
        involvedObjectName: 'gke-node-b',
      },
    ];
    const { runner } = createRunner(cluster);

    const outcome = await runner.run(TARGETS.streaming);

    expect(outcome).toMatchObject({
      status: 'reported',
      record: {
        mode: 'Streaming',
        imageStreamingConfirmed: true,
        report: { imagePull: 0, imagePullObserved: false, runtimeStartup: 8, totalWallClock: 0 },
      },
    });
    expect(cluster.calls).toEqual([
      'delete pod-streaming.yaml',
      'delete deployments app=large-image-streaming',
      'apply pod-streaming.yaml',
    ]);
  });
});

describe('isImageStreamingEvent', () => {
  test('requires the reason and the message', () => {
    expect(isImageStreamingEvent({ reason: 'ImageStreaming', message: 'backed by image streaming' })).toBe(true);
    expect(isImageStreamingEvent({ reason: 'ImageStreaming', message: 'disabled' })).toBe(false);
    expect(isImageStreamingEvent({ reason: 'Pulled', message: 'backed by image streaming' })).toBe(false);
  });
});
