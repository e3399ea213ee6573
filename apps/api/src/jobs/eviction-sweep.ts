import type { AdmissionController } from "@turnstile/core";
import { createLogger } from "../logger.js";
import type { Logger } from "../logger.js";

export interface EvictionSweepJobConfig {
  controller: AdmissionController;
  intervalMs?: number;
  logger?: Logger;
}

/**
 * Periodically evicts idle client entries from the admission controller.
 * Returns a cleanup function that stops the interval.
 */
export function startEvictionSweepJob(config: EvictionSweepJobConfig): () => void {
  const { controller, intervalMs = 60_000, logger = createLogger("eviction-sweep") } = config;

  const timer = setInterval(() => {
    try {
      const evicted = controller.sweep();
      if (evicted > 0) {
        logger.debug({ evicted, remaining: controller.size }, "Evicted idle clients");
      }
    } catch (err) {
      logger.error({ err }, "Error sweeping admission state");
    }
  }, intervalMs);
  timer.unref();

  return () => {
    clearInterval(timer);
  };
}
