import logger from '../lib/logger';
import type { ClusterClient } from './kubernetes';
import type { ClusterObserver } from './clusterObserver';
import { IMAGE_CLEANER_SELECTOR, RESET_CACHE_MANIFEST } from './targets';

/**
 * Cache Reset Controller
 * Runs the image-cleaner workload so the next pull of a large image is cold.
 */
export class CacheResetController {
  constructor(
    private readonly cluster: ClusterClient,
    private readonly observer: ClusterObserver,
    private readonly timeoutMs: number
  ) {}

  /**
   * Apply the cleaner, wait until every cleaner pod is Ready, then remove it.
   * The cleaner is removed even when the wait fails; the failure propagates.
   */
  async resetCache(): Promise<void> {
    logger.info({ manifest: RESET_CACHE_MANIFEST }, 'Resetting image cache');
    await this.cluster.applyManifest(RESET_CACHE_MANIFEST);

    try {
      const pods = await this.observer.waitForPodsReady(IMAGE_CLEANER_SELECTOR, this.timeoutMs);
      logger.info({ pods: pods.length }, 'Image cache cleared');
    } finally {
      await this.cluster.deleteManifest(RESET_CACHE_MANIFEST);
    }
  }
}
