import type {
  ComparisonReport,
  DurationAnomaly,
  DurationMetric,
  DurationReport,
  PhaseTimestampSet,
  RunRecord,
  SubPhaseName,
  TimestampPhase,
} from '@coldstart/shared';
import { MissingTimestampError } from '../lib/errors';
import type { ClusterEvent, PodSnapshot } from './kubernetes';
import { findContainer } from './clusterObserver';
import { PHASE_MARKERS, withDefaultSubPhases } from './logScraper';

export const REQUIRED_PHASES: readonly TimestampPhase[] = [
  'applyTime',
  'creationTime',
  'scheduledTime',
  'containerRunningTime',
  'appReadyTime',
];

const METRIC_COLUMN_WIDTH = 25;
const MODE_COLUMN_WIDTH = 12;

/**
 * Record a phase timestamp. A timestamp that is already set is never
 * overwritten; an undefined value leaves the set unchanged.
 */
export function recordPhase(
  set: PhaseTimestampSet,
  phase: TimestampPhase,
  value: number | undefined
): PhaseTimestampSet {
  if (value === undefined || set[phase] !== undefined) {
    return set;
  }
  return { ...set, [phase]: value };
}

/**
 * Earliest timestamp among events with the given reason
 */
export function earliestEventTime(events: ClusterEvent[], reason: string): number | undefined {
  let earliest: number | undefined;
  for (const event of events) {
    if (event.reason !== reason || event.firstTimestamp === undefined) {
      continue;
    }
    if (earliest === undefined || event.firstTimestamp < earliest) {
      earliest = event.firstTimestamp;
    }
  }
  return earliest;
}

/**
 * Fold cluster-sourced timestamps for a pod into the set: creation from
 * metadata, scheduling from the PodScheduled condition, container start from
 * its running state, image pull from Pulling/Pulled events.
 */
export function collectTimestamps(
  set: PhaseTimestampSet,
  pod: PodSnapshot,
  events: ClusterEvent[],
  container?: string
): PhaseTimestampSet {
  let result = recordPhase(set, 'creationTime', pod.creationTime);
  result = recordPhase(result, 'scheduledTime', pod.scheduledTime);
  result = recordPhase(result, 'containerRunningTime', findContainer(pod, container)?.startedAt);
  result = recordPhase(result, 'pullStart', earliestEventTime(events, 'Pulling'));
  result = recordPhase(result, 'pullEnd', earliestEventTime(events, 'Pulled'));
  return result;
}

interface CompleteTimestamps {
  applyTime: number;
  creationTime: number;
  scheduledTime: number;
  containerRunningTime: number;
  appReadyTime: number;
}

function requireTimestamps(set: PhaseTimestampSet): CompleteTimestamps {
  const { applyTime, creationTime, scheduledTime, containerRunningTime, appReadyTime } = set;
  if (
    applyTime === undefined ||
    creationTime === undefined ||
    scheduledTime === undefined ||
    containerRunningTime === undefined ||
    appReadyTime === undefined
  ) {
    throw new MissingTimestampError(REQUIRED_PHASES.filter((phase) => set[phase] === undefined));
  }
  return { applyTime, creationTime, scheduledTime, containerRunningTime, appReadyTime };
}

/**
 * Reduce a completed timestamp set to named durations in seconds.
 * Negative durations are kept and listed as anomalies.
 */
export function reduce(
  set: PhaseTimestampSet,
  subPhases: Partial<Record<SubPhaseName, number>> = {}
): DurationReport {
  const t = requireTimestamps(set);

  const imagePullObserved = set.pullStart !== undefined && set.pullEnd !== undefined;
  const imagePull = set.pullStart !== undefined && set.pullEnd !== undefined ? set.pullEnd - set.pullStart : 0;

  const durations: Record<DurationMetric, number> = {
    nodeProvisioning: t.scheduledTime - t.creationTime,
    imagePull,
    runtimeStartup: t.containerRunningTime - t.scheduledTime - imagePull,
    totalWallClock: t.appReadyTime - t.applyTime,
  };

  const anomalies: DurationAnomaly[] = [];
  for (const metric of ['nodeProvisioning', 'imagePull', 'runtimeStartup', 'totalWallClock'] as const) {
    if (durations[metric] < 0) {
      anomalies.push({ metric, value: durations[metric] });
    }
  }

  return {
    ...durations,
    imagePullObserved,
    subPhases: withDefaultSubPhases(subPhases),
    anomalies,
  };
}

/**
 * Compare run records by total wall clock. A shared minimum yields no winner.
 */
export function compareRecords(records: RunRecord[]): ComparisonReport {
  if (records.length < 2) {
    throw new Error('A comparison needs at least two run records');
  }

  const totals = records.map((record) => record.report.totalWallClock);
  const min = Math.min(...totals);
  const max = Math.max(...totals);
  const tied = records.filter((record) => record.report.totalWallClock === min);
  const slowest = records.find((record) => record.report.totalWallClock === max) ?? records[0];
  const improvement = max - min;

  if (tied.length > 1) {
    const [first, ...others] = tied;
    return {
      records,
      fastest: null,
      slowest: slowest.mode,
      improvement,
      summary: `${others.map((record) => record.mode).join(', ')} is not faster than ${first.mode} (${min}s).`,
    };
  }

  const fastest = tied[0];
  return {
    records,
    fastest: fastest.mode,
    slowest: slowest.mode,
    improvement,
    summary: `${fastest.mode} is ${improvement}s faster than ${slowest.mode}.`,
  };
}

function isAnomalous(report: DurationReport, metric: DurationMetric): boolean {
  return report.anomalies.some((anomaly) => anomaly.metric === metric);
}

/**
 * Seconds with markers: `!` negative duration, `?` image pull not observed
 */
export function formatMetric(report: DurationReport, metric: DurationMetric): string {
  let text = `${report[metric]}s`;
  if (isAnomalous(report, metric)) {
    text += '!';
  }
  if (metric === 'imagePull' && !report.imagePullObserved) {
    text += '?';
  }
  return text;
}

function footnotes(reports: DurationReport[]): string[] {
  const notes: string[] = [];
  if (reports.some((report) => report.anomalies.length > 0)) {
    notes.push('! negative duration: clock skew or out-of-order events');
  }
  if (reports.some((report) => !report.imagePullObserved)) {
    notes.push('? image pull events not observed, counted as 0s');
  }
  return notes;
}

const RULE = '-'.repeat(48);

export function renderRunSummary(record: RunRecord): string {
  const { report } = record;
  const row = (label: string, metric: DurationMetric) => `${label.padEnd(METRIC_COLUMN_WIDTH)}${formatMetric(report, metric)}`;

  return [
    RULE,
    `Metrics for ${record.mode} (${record.podName})`,
    RULE,
    row('1. Node Provisioning:', 'nodeProvisioning'),
    row('2. Image Pulling:', 'imagePull'),
    row('3. Runtime Startup:', 'runtimeStartup'),
    RULE,
    row('Total Wall Clock:', 'totalWallClock'),
    RULE,
    ...footnotes([report]),
  ].join('\n');
}

export function renderComparisonTable(comparison: ComparisonReport): string {
  const { records } = comparison;
  const reports = records.map((record) => record.report);
  const width = METRIC_COLUMN_WIDTH + 1 + records.length * (MODE_COLUMN_WIDTH + 3);
  const title = 'STARTUP PERFORMANCE COMPARISON';

  const row = (label: string, cells: string[]) =>
    [label.padEnd(METRIC_COLUMN_WIDTH), ...cells.map((cell) => cell.padEnd(MODE_COLUMN_WIDTH))].join(' | ').trimEnd();
  const metricRow = (label: string, metric: DurationMetric) =>
    row(label, reports.map((report) => formatMetric(report, metric)));
  const subPhaseRow = (label: string, phase: SubPhaseName) =>
    row(label, reports.map((report) => `${report.subPhases[phase]}s`));

  return [
    '='.repeat(width),
    `${' '.repeat(Math.floor((width - title.length) / 2))}${title}`,
    '='.repeat(width),
    row('Metric', records.map((record) => record.mode)),
    '-'.repeat(width),
    metricRow('Node Provisioning', 'nodeProvisioning'),
    metricRow('Image Pulling', 'imagePull'),
    metricRow('Runtime Startup', 'runtimeStartup'),
    ...PHASE_MARKERS.map((marker) => subPhaseRow(marker.label, marker.phase)),
    '-'.repeat(width),
    metricRow('TOTAL WALL CLOCK', 'totalWallClock'),
    '='.repeat(width),
    ...footnotes(reports),
    comparison.summary,
  ].join('\n');
}
