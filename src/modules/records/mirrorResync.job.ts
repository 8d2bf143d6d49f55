// src/modules/records/mirrorResync.job.ts
// Re-pushes records whose mirror write failed (sync_flag = 1) and clears the flag on success.

import { errorMeta, log } from "@/lib/observability/logger";
import type { ResourceDefinition } from "./record.definition";
import { serializeRecord } from "./record.mapper";
import type { RecordMirror, RecordStore } from "./record.store";

export type MirrorResyncSummary = {
  resource: string;
  scanned: number;
  resynced: number;
  /** A newer write reached the row or the mirror first and now owns its flag. */
  superseded: number;
  failed: number;
};

export type MirrorResyncJobDeps = {
  store: RecordStore;
  mirror: RecordMirror;
  resources: readonly ResourceDefinition[];
  batchSize?: number;
};

export class MirrorResyncJob {
  private readonly batchSize: number;

  constructor(private readonly deps: MirrorResyncJobDeps) {
    this.batchSize = deps.batchSize ?? 100;
  }

  async run(): Promise<MirrorResyncSummary[]> {
    const summaries: MirrorResyncSummary[] = [];

    for (const resource of this.deps.resources) {
      if (!resource.mirror) continue;
      summaries.push(await this.runResource(resource));
    }

    return summaries;
  }

  /** One batch per run; a record that fails again keeps its flag for the next run. */
  async runResource(resource: ResourceDefinition): Promise<MirrorResyncSummary> {
    const summary: MirrorResyncSummary = {
      resource: resource.name,
      scanned: 0,
      resynced: 0,
      superseded: 0,
      failed: 0,
    };

    const binding = resource.mirror;
    if (!binding) return summary;

    const pending = await this.deps.store.findUnsynced(resource, this.batchSize);

    for (const record of pending) {
      summary.scanned++;

      try {
        const outcome = await this.deps.mirror.upsert(
          binding.collection,
          serializeRecord(record),
          binding.uniqueKeys,
        );
        const cleared =
          outcome === "written" &&
          (await this.deps.store.setSyncFlag(resource, record.id, null, record.lockVersion));

        if (cleared) {
          summary.resynced++;
        } else {
          summary.superseded++;
        }
      } catch (err) {
        summary.failed++;
        log("WARN", "MIRROR_RESYNC_RECORD_FAILED", {
          resource: resource.name,
          recordId: record.id,
          ...errorMeta(err),
        });
      }
    }

    if (summary.scanned > 0) {
      log("INFO", "MIRROR_RESYNC_COMPLETED", summary);
    }

    return summary;
  }
}
