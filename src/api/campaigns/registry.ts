/**
 * In-process registry of running campaigns, so an operator can cancel one by id.
 */

import type { CampaignRun } from '../conversation/types.ts';
import { createLogger, errorMessage } from '../logger.ts';

const log = createLogger('campaign-registry');

interface RunningCampaign {
  controller: AbortController;
  completion: Promise<CampaignRun | null>;
}

export class CampaignRegistry {
  private readonly running = new Map<string, RunningCampaign>();

  /**
   * Track a run until `work` settles. A rejected run is logged and resolves to null;
   * the run record keeps whatever was last persisted.
   */
  track(runId: string, controller: AbortController, work: Promise<CampaignRun>): void {
    const completion = work
      .catch((error: unknown) => {
        log.error('Campaign run failed', { runId, error: errorMessage(error) });
        return null;
      })
      .finally(() => {
        this.running.delete(runId);
      });
    this.running.set(runId, { controller, completion });
  }

  /** Returns false when the run is not (or no longer) running here. */
  cancel(runId: string): boolean {
    const entry = this.running.get(runId);
    if (!entry) {
      return false;
    }
    if (!entry.controller.signal.aborted) {
      log.info('Campaign cancellation requested', { runId });
      entry.controller.abort();
    }
    return true;
  }

  isRunning(runId: string): boolean {
    return this.running.has(runId);
  }

  /** Resolves when the run settles; null for unknown ids or failed runs. */
  async wait(runId: string): Promise<CampaignRun | null> {
    const entry = this.running.get(runId);
    return entry ? entry.completion : null;
  }

  /** Abort every run and wait for them to finalize. */
  async shutdown(): Promise<void> {
    const entries = [...this.running.values()];
    for (const entry of entries) {
      entry.controller.abort();
    }
    await Promise.all(entries.map((entry) => entry.completion));
  }
}
