import { executeDetection, type DetectionDeps } from "./runDetection";
import type { DetectionSummary } from "./types";

export interface DetectionRunner {
  /** Queues behind any run already in flight for the same tenant. */
  run(tenantId: string): Promise<DetectionSummary>;
  isRunning(tenantId: string): boolean;
}

/**
 * In-process runner that never lets two runs for the same tenant overlap.
 * Runs for different tenants proceed concurrently.
 */
export function createDetectionRunner(deps: DetectionDeps): DetectionRunner {
  // Tail of each tenant's queue; always settles, never rejects
  const tails = new Map<string, Promise<void>>();

  return {
    run(tenantId: string): Promise<DetectionSummary> {
      const previous = tails.get(tenantId) ?? Promise.resolve();
      const result = previous.then(() => executeDetection(deps, tenantId));

      const tail = result.then(
        () => undefined,
        () => undefined
      );
      tails.set(tenantId, tail);
      void tail.then(() => {
        if (tails.get(tenantId) === tail) tails.delete(tenantId);
      });

      return result;
    },

    isRunning(tenantId: string): boolean {
      return tails.has(tenantId);
    },
  };
}
