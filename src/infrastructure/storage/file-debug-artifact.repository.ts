import { mkdir, rm, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import type { StrategyKind } from "../../core/domain/entities/extraction-result.entity.js";
import type {
  DebugArtifact,
  IDebugArtifactStore,
} from "../../core/domain/repositories/debug-artifact.repository.js";
import { documentStem, listFilesRecursive, pageLabel } from "../utils/storage.utils.js";

/**
 * Debug artifacts on disk: `<root>/<document stem>/page_image_page_01.png`
 * and `model_response_<strategy>_page_01.txt`.
 */
export class FileDebugArtifactStore implements IDebugArtifactStore {
  constructor(private readonly root: string) {}

  folderFor(sourceFile: string): string {
    return documentStem(sourceFile);
  }

  localFolder(sourceFile: string): string {
    return join(this.root, this.folderFor(sourceFile));
  }

  async savePageImage(sourceFile: string, page: number, image: Buffer): Promise<string> {
    return this.write(sourceFile, `page_image_page_${pageLabel(page)}.png`, image);
  }

  async saveModelResponse(
    sourceFile: string,
    page: number,
    strategy: StrategyKind,
    text: string,
  ): Promise<string> {
    return this.write(
      sourceFile,
      `model_response_${strategy}_page_${pageLabel(page)}.txt`,
      text,
    );
  }

  async listArtifacts(sourceFile: string): Promise<DebugArtifact[]> {
    const dir = this.localFolder(sourceFile);
    const folder = this.folderFor(sourceFile);
    return listFilesRecursive(dir).map((file) => ({
      localPath: join(dir, file),
      key: `${folder}/${file}`,
    }));
  }

  async deleteForSource(sourceFile: string): Promise<boolean> {
    const dir = this.localFolder(sourceFile);
    if (!existsSync(dir)) return false;
    await rm(dir, { recursive: true, force: true });
    return true;
  }

  private async write(sourceFile: string, name: string, data: Buffer | string): Promise<string> {
    const dir = this.localFolder(sourceFile);
    await mkdir(dir, { recursive: true });
    const path = join(dir, name);
    await writeFile(path, data);
    return path;
  }
}
