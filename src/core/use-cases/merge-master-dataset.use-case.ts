import type { CanonicalRecord, IngestMode } from "../domain/entities/price-record.entity.js";
import { distinctTriples, tripleKey } from "../domain/entities/price-record.entity.js";
import type { IMasterDatasetRepository } from "../domain/repositories/master-dataset.repository.js";
import type { IDebugArtifactStore } from "../domain/repositories/debug-artifact.repository.js";
import {
  type IArtifactMirror,
  remoteDebugPath,
} from "../domain/services/artifact-mirror.service.js";
import type { IDatasetExporter } from "../domain/services/dataset-exporter.service.js";
import type { ILogger } from "../domain/services/logger.service.js";
import { type MergeResult, mergeRecords } from "../domain/services/master-dataset-merger.service.js";
import { errorMessage } from "../domain/errors.js";
import { KeyedLock } from "../../infrastructure/utils/concurrency.utils.js";

export interface MergeRequest {
  records: CanonicalRecord[];
  mode: IngestMode;
  runId: string;
}

export interface MergeMasterDatasetOptions {
  debugStore?: IDebugArtifactStore;
  mirror?: IArtifactMirror;
  exporter?: IDatasetExporter;
  /** Remote path of the spreadsheet snapshot uploaded after each merge. */
  mirrorDatasetPath?: string;
  locks?: KeyedLock;
}

export class MergeMasterDatasetUseCase {
  private readonly locks: KeyedLock;

  constructor(
    private repository: IMasterDatasetRepository,
    private logger: ILogger,
    private options: MergeMasterDatasetOptions = {},
  ) {
    this.locks = options.locks ?? new KeyedLock();
  }

  async execute(request: MergeRequest): Promise<MergeResult | null> {
    if (request.records.length === 0) return null;

    const triples = distinctTriples(request.records);
    const result = await this.locks.withLocks(triples.map(tripleKey), async () => {
      if (request.mode === "append") {
        const merged = mergeRecords([], request.records, "append");
        await this.repository.appendRecords(merged.records);
        return merged;
      }
      const existing = await this.repository.readTriples(triples);
      const merged = mergeRecords(existing, request.records, "update");
      await this.repository.replaceTriples(merged.triples, merged.records, existing.length);
      return merged;
    });

    this.logger.log({
      event: "merge.applied",
      level: "info",
      runId: request.runId,
      message: `${result.mode}: ${result.inserted} inserted, ${result.removed} removed`,
      triples: result.triples,
      inserted: result.inserted,
      removed: result.removed,
      keptFromBatch: result.keptFromBatch,
      collapsed: result.collapsed,
    });

    await this.cleanupReplaced(result.replacedDocuments, request.runId);
    await this.refreshMirror(request.runId);
    return result;
  }

  private async cleanupReplaced(documents: string[], runId: string): Promise<void> {
    const { debugStore, mirror } = this.options;
    if (!debugStore) return;
    // Runs after the commit: failures are logged and the merge stands.
    for (const doc of documents) {
      const folder = debugStore.folderFor(doc);
      try {
        const removed = await debugStore.deleteForSource(doc);
        this.logger.log({
          event: "artifact.cleanup",
          level: "info",
          runId,
          sourceFile: doc,
          message: removed ? `Removed debug folder ${folder}` : `No debug folder for ${doc}`,
        });
      } catch (e) {
        this.logger.log({
          event: "artifact.cleanup",
          level: "warn",
          runId,
          sourceFile: doc,
          message: `Cannot remove debug folder ${folder}: ${errorMessage(e)}`,
        });
      }
      if (!mirror) continue;
      try {
        await mirror.deleteFolder(remoteDebugPath(folder));
      } catch (e) {
        this.logMirrorSkip(runId, `delete ${folder}`, e);
      }
    }
  }

  private async refreshMirror(runId: string): Promise<void> {
    const { exporter, mirror, mirrorDatasetPath } = this.options;
    if (!exporter) return;
    let path: string;
    try {
      path = await exporter.export();
    } catch (e) {
      this.logMirrorSkip(runId, "export", e);
      return;
    }
    if (!mirror || !mirrorDatasetPath) return;
    try {
      await mirror.uploadFile(path, mirrorDatasetPath);
      this.logger.log({
        event: "mirror.uploaded",
        level: "info",
        runId,
        message: `${mirror.name}: ${mirrorDatasetPath}`,
      });
    } catch (e) {
      this.logMirrorSkip(runId, `upload ${mirrorDatasetPath}`, e);
    }
  }

  private logMirrorSkip(runId: string, action: string, e: unknown): void {
    this.logger.log({
      event: "mirror.skipped",
      level: "warn",
      runId,
      message: `${this.options.mirror?.name ?? "mirror"} ${action} failed: ${errorMessage(e)}`,
    });
  }
}
