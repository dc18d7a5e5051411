import type { StrategyKind } from "../entities/extraction-result.entity.js";

export interface DebugArtifact {
  localPath: string;
  /** `<folder>/<file name>`, used as the remote mirror path. */
  key: string;
}

/** Disposable per-page images and raw model replies, grouped by source file. */
export interface IDebugArtifactStore {
  /** Folder key for a source file: its stem. */
  folderFor(sourceFile: string): string;
  savePageImage(sourceFile: string, page: number, image: Buffer): Promise<string>;
  saveModelResponse(
    sourceFile: string,
    page: number,
    strategy: StrategyKind,
    text: string,
  ): Promise<string>;
  listArtifacts(sourceFile: string): Promise<DebugArtifact[]>;
  /** True when a folder existed and was removed. */
  deleteForSource(sourceFile: string): Promise<boolean>;
}
