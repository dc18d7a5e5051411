/**
 * Remote copy of debug artifact folders and dataset snapshots. Callers log
 * and skip on failure; the mirror never blocks a merge.
 */
export interface IArtifactMirror {
  readonly name: string;
  uploadFile(localPath: string, remotePath: string): Promise<void>;
  deleteFolder(remotePath: string): Promise<void>;
}

/** Remote folder holding one sub-folder of debug artifacts per document. */
export const DEBUG_REMOTE_ROOT = "debug";

export function remoteDebugPath(key: string): string {
  return `${DEBUG_REMOTE_ROOT}/${key}`;
}
