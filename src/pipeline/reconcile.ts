import * as fs from "fs";
import * as path from "path";
import { failProcessing, type ExampleStore } from "../store/examples";
import type { IngestJob } from "../contracts";

export const INTERRUPTED_MESSAGE = "Interrupted during processing; pending file missing";

export interface ReconcileSummary {
  /** Records handed back to the pipeline from their pending file */
  resubmitted: string[];
  /** Records marked failed because nothing was left to process */
  failed: string[];
}

/**
 * Settle records left in the processing state by a previous run.
 *
 * Call once at startup, before new work is accepted: every processing record
 * is assumed orphaned. Resolves after all resubmitted jobs have finished.
 */
export async function reconcileOnStartup(
  store: ExampleStore,
  pendingDir: string,
  submit: (job: IngestJob) => Promise<void>
): Promise<ReconcileSummary> {
  const summary: ReconcileSummary = { resubmitted: [], failed: [] };
  const jobs: Promise<void>[] = [];

  for (const record of store.loadAll()) {
    if (!record.processing) continue;

    const pendingPath = record.pending_file ? path.join(pendingDir, record.pending_file) : null;
    if (pendingPath && fs.existsSync(pendingPath)) {
      summary.resubmitted.push(record.id);
      jobs.push(
        submit({
          pendingPath,
          originalFilename: record.original_filename,
          recordId: record.id,
        })
      );
      continue;
    }

    if (failProcessing(store, record.id, INTERRUPTED_MESSAGE)) {
      summary.failed.push(record.id);
    }
  }

  if (summary.resubmitted.length > 0 || summary.failed.length > 0) {
    console.log(
      `[reconcile] Resubmitted ${summary.resubmitted.length}, marked failed ${summary.failed.length}`
    );
  }

  await Promise.all(jobs);
  return summary;
}
