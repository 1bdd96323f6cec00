import type { ComparisonReport, DeploymentTarget, RunRecord, TargetId } from '@coldstart/shared';
import logger from '../lib/logger';
import type { BenchConsole } from '../lib/console';
import type { RunOutcome } from './measurement';
import { compareRecords, renderComparisonTable, renderRunSummary } from './phaseReducer';
import { getTarget } from './targets';

export type SuiteName = 'default' | 'runai' | 'compare' | 'image-streaming';

interface SuiteDefinition {
  description: string;
  targets: TargetId[];
  /** Remove every target's workload and reset the image cache first */
  coldImageCache: boolean;
}

export const SUITES: Record<SuiteName, SuiteDefinition> = {
  default: {
    description: 'Standard vLLM deployment',
    targets: ['standard'],
    coldImageCache: false,
  },
  runai: {
    description: 'vLLM deployment with the Run:ai model streamer',
    targets: ['runai'],
    coldImageCache: false,
  },
  compare: {
    description: 'Standard vs Run:ai model streamer',
    targets: ['standard', 'runai'],
    coldImageCache: false,
  },
  'image-streaming': {
    description: 'Large image, standard pull vs image streaming',
    targets: ['standard-pull', 'streaming'],
    coldImageCache: true,
  },
};

export interface TargetRunner {
  run(target: DeploymentTarget): Promise<RunOutcome>;
  cleanup(target: DeploymentTarget): Promise<void>;
}

export interface CacheResetter {
  resetCache(): Promise<void>;
}

export interface SuiteDeps {
  runner: TargetRunner;
  cacheReset: CacheResetter;
  console: BenchConsole;
}

export interface SuiteResult {
  suite: SuiteName;
  success: boolean;
  records: RunRecord[];
  comparison?: ComparisonReport;
}

/**
 * Run a suite's targets strictly one after another. The first failed run
 * ends the suite; a comparison is only rendered when every run reported.
 */
export async function runSuite(name: SuiteName, deps: SuiteDeps): Promise<SuiteResult> {
  const { runner, cacheReset, console: out } = deps;
  const suite = SUITES[name];
  const targets = suite.targets.map(getTarget);
  const records: RunRecord[] = [];

  out.phase(`Suite: ${suite.description}`);
  logger.info({ suite: name, targets: suite.targets }, 'Starting suite');

  if (suite.coldImageCache) {
    try {
      for (const target of targets) {
        await runner.cleanup(target);
      }
      out.step('Resetting the node image cache');
      await cacheReset.resetCache();
      out.success('Image cache reset');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      out.endDots();
      out.error(`Preparation failed: ${message}`);
      logger.error({ suite: name, err }, 'Suite preparation failed');
      return { suite: name, success: false, records };
    }
  }

  for (const target of targets) {
    const outcome = await runner.run(target);
    if (outcome.status === 'failed') {
      return { suite: name, success: false, records };
    }
    records.push(outcome.record);
    out.block(renderRunSummary(outcome.record));
    reportImageStreaming(outcome.record, out);
  }

  if (records.length < 2) {
    return { suite: name, success: true, records };
  }

  const comparison = compareRecords(records);
  out.line();
  out.block(renderComparisonTable(comparison));
  logger.info({ suite: name, fastest: comparison.fastest, improvement: comparison.improvement }, 'Suite complete');
  return { suite: name, success: true, records, comparison };
}

function reportImageStreaming(record: RunRecord, out: BenchConsole): void {
  if (record.imageStreamingConfirmed === undefined) {
    return;
  }
  if (record.imageStreamingConfirmed) {
    out.success(`Image streaming confirmed for ${record.podName}`);
  } else {
    out.warning(`No image streaming event found for ${record.podName}; the image may have been pulled in full`);
  }
}

export interface CliArgs {
  suite: SuiteName;
  help: boolean;
}

const SUITE_FLAGS: Record<string, SuiteName> = {
  '--runai': 'runai',
  '--compare': 'compare',
  '--image-streaming': 'image-streaming',
};

/**
 * Parse command-line arguments. Without a suite flag the default suite runs.
 */
export function parseArgs(args: string[]): CliArgs {
  let suite: SuiteName = 'default';
  let help = false;

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      help = true;
      continue;
    }
    const selected = SUITE_FLAGS[arg];
    if (!selected) {
      throw new Error(`Unknown option: ${arg}`);
    }
    if (suite !== 'default') {
      throw new Error(`Only one suite can run at a time (got --${suite} and ${arg})`);
    }
    suite = selected;
  }

  return { suite, help };
}

export const USAGE = `
Cold-start benchmark
====================

Usage: npm run bench -- [option]

Options:
  (none)             Measure the standard vLLM deployment
  --runai            Measure the deployment using the Run:ai model streamer
  --compare          Measure both and print a comparison table
  --image-streaming  Reset the image cache, then compare a standard pull with image streaming
  --help, -h         Show this help message

Environment Variables:
  BENCH_NAMESPACE     Namespace holding the workloads (default: default)
  MANIFEST_DIR        Directory with the workload manifests (default: ./manifests)
  GPU_NODE_SELECTOR   Label selector of the GPU nodes (default: cloud.google.com/compute-class=l4)
  DELETE_GPU_NODES    Delete GPU nodes before vLLM runs (default: true)
  LOG_LEVEL           Structured log level on stderr (default: info)
`;
