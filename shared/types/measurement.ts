export type PodPhase = 'Pending' | 'Running' | 'Succeeded' | 'Failed' | 'Unknown';

/** Display name of a delivery strategy, e.g. "Standard", "Streaming", "RunAI" */
export type ModeName = string;

export type TargetId = 'standard' | 'runai' | 'standard-pull' | 'streaming';

export type Readiness =
  | { kind: 'logMarker'; marker: string }
  | { kind: 'podReady' };

export interface DeploymentTarget {
  id: TargetId;
  mode: ModeName;
  manifest: string;              // File name inside MANIFEST_DIR
  selector: string;              // Pod label selector, e.g. app=model-server
  container?: string;            // Defaults to the pod's first container
  readiness: Readiness;
  deleteGpuNodes: boolean;       // Force a node scale-up before the run
  verifyImageStreaming: boolean;
}

/**
 * Integer epoch seconds. Each entry stays undefined until observed.
 */
export interface PhaseTimestampSet {
  applyTime?: number;
  creationTime?: number;
  scheduledTime?: number;
  pullStart?: number;
  pullEnd?: number;
  containerRunningTime?: number;
  appReadyTime?: number;
}

export type TimestampPhase = keyof PhaseTimestampSet;

export type SubPhaseName = 'weightLoad' | 'compile' | 'graphCapture';

export type SubPhaseDurations = Record<SubPhaseName, number>;

export type DurationMetric = 'nodeProvisioning' | 'imagePull' | 'runtimeStartup' | 'totalWallClock';

export interface DurationAnomaly {
  metric: DurationMetric;
  value: number;
}

export interface DurationReport {
  nodeProvisioning: number;
  imagePull: number;
  imagePullObserved: boolean;    // false when Pulling/Pulled events were missing
  runtimeStartup: number;
  totalWallClock: number;
  subPhases: SubPhaseDurations;
  anomalies: DurationAnomaly[];
}

export interface RunRecord {
  targetId: TargetId;
  mode: ModeName;
  podName: string;
  nodeName: string;
  report: DurationReport;
  imageStreamingConfirmed?: boolean;
}

export interface ComparisonReport {
  records: RunRecord[];
  fastest: ModeName | null;      // null when the minimum total is shared
  slowest: ModeName;
  improvement: number;           // Seconds between slowest and fastest totals
  summary: string;
}
