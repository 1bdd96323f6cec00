#!/usr/bin/env node
/**
 * Cold-start benchmark CLI
 * Measures how long an inference workload takes from apply to serving.
 */

import { createConsole } from './lib/console';
import logger from './lib/logger';
import { ConfigError, loadConfig } from './services/config';
import { KubernetesService } from './services/kubernetes';
import { ClusterObserver } from './services/clusterObserver';
import { MeasurementRunner } from './services/measurement';
import { CacheResetController } from './services/cacheReset';
import { USAGE, parseArgs, runSuite } from './services/suites';

const out = createConsole();

async function main(): Promise<number> {
  let args;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    out.error(error instanceof Error ? error.message : String(error));
    out.line(USAGE);
    return 1;
  }

  if (args.help) {
    out.line(USAGE);
    return 0;
  }

  let config;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) {
        out.error(issue);
      }
      return 1;
    }
    throw error;
  }

  const cluster = new KubernetesService(config.namespace, config.manifestDir);
  out.info(`Context: ${cluster.getCurrentContext()}`);
  out.info(`Namespace: ${config.namespace}`);
  out.info(`Manifests: ${config.manifestDir}`);

  const observer = new ClusterObserver(cluster, {
    intervals: config.intervals,
    timeouts: config.timeouts,
    onPoll: () => out.dot(),
  });
  const runner = new MeasurementRunner({
    cluster,
    observer,
    console: out,
    gpuNodeSelector: config.gpuNodeSelector,
    deleteGpuNodes: config.deleteGpuNodes,
  });
  const cacheReset = new CacheResetController(cluster, observer, config.timeouts.cacheResetMs);

  const result = await runSuite(args.suite, { runner, cacheReset, console: out });
  if (result.success) {
    out.success('Benchmark complete');
    return 0;
  }
  out.error('Benchmark failed');
  return 1;
}

process.on('SIGINT', () => {
  out.endDots();
  out.warning('Interrupted. Workloads are left in place.');
  process.exit(130);
});

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    out.endDots();
    out.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
    logger.error({ err: error }, 'Benchmark aborted');
    process.exitCode = 1;
  });
