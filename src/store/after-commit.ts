import { logger } from "../utils/logger";
import type { AfterCommitCallback } from "./types";

/**
 * Runs callbacks queued through `UnitOfWork.onCommit`, in order. The data is
 * already committed, so a failing callback is logged and the rest still run.
 */
export async function drainAfterCommit(callbacks: AfterCommitCallback[]): Promise<void> {
  for (const [index, callback] of callbacks.entries()) {
    try {
      await callback();
    } catch (err) {
      logger.error({ err, index }, "After-commit callback failed");
    }
  }
}
