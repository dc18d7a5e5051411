import { readFile } from "node:fs/promises";
import { fetch, type Dispatcher } from "undici";
import { z } from "zod";
import type { IArtifactMirror } from "../../core/domain/services/artifact-mirror.service.js";
import { remoteErrorFor } from "../utils/remote-error.utils.js";
import { normalizeRelativePath } from "../utils/storage.utils.js";

export interface GithubMirrorOptions {
  owner: string;
  repo: string;
  branch: string;
  token: string;
  /** Prefix for every remote path, e.g. "debug". */
  root?: string;
  apiUrl?: string;
  dispatcher?: Dispatcher;
}

const ContentEntry = z.object({
  type: z.string(),
  path: z.string(),
  sha: z.string(),
});

/** Spaces become underscores and each segment is URL-encoded. */
export function sanitizeRepoPath(path: string): string {
  return normalizeRelativePath(path)
    .split("/")
    .map((segment) => encodeURIComponent(segment.replace(/\s+/g, "_")))
    .join("/");
}

/** Mirror through the GitHub contents API: one commit per file. */
export class GithubArtifactMirror implements IArtifactMirror {
  readonly name = "github";

  constructor(private options: GithubMirrorOptions) {}

  async uploadFile(localPath: string, remotePath: string): Promise<void> {
    const path = this.repoPath(remotePath);
    const existing = await this.request("GET", `${path}?ref=${encodeURIComponent(this.options.branch)}`);
    const parsed = existing === null ? null : ContentEntry.safeParse(existing);
    const sha = parsed?.success ? parsed.data.sha : undefined;

    const content = (await readFile(localPath)).toString("base64");
    await this.request("PUT", path, {
      message: `Upload ${remotePath}`,
      content,
      branch: this.options.branch,
      ...(sha ? { sha } : {}),
    });
  }

  async deleteFolder(remotePath: string): Promise<void> {
    await this.deletePath(this.repoPath(remotePath));
  }

  private async deletePath(path: string): Promise<void> {
    const listing = await this.request("GET", `${path}?ref=${encodeURIComponent(this.options.branch)}`);
    if (listing === null) return;
    const entries = z.array(ContentEntry).safeParse(listing);
    if (!entries.success) return;
    for (const entry of entries.data) {
      const entryPath = entry.path.split("/").map(encodeURIComponent).join("/");
      if (entry.type === "dir") {
        await this.deletePath(entryPath);
        continue;
      }
      await this.request("DELETE", entryPath, {
        message: `Remove ${entry.path}`,
        sha: entry.sha,
        branch: this.options.branch,
      });
    }
  }

  private repoPath(remotePath: string): string {
    const root = this.options.root ? `${this.options.root}/` : "";
    return sanitizeRepoPath(`${root}${remotePath}`);
  }

  /** Parsed JSON body, or null on 404. */
  private async request(method: string, path: string, body?: object): Promise<unknown> {
    const base = (this.options.apiUrl ?? "https://api.github.com").replace(/\/$/, "");
    const url = `${base}/repos/${this.options.owner}/${this.options.repo}/contents/${path}`;
    const res = await fetch(url, {
      method,
      headers: {
        Accept: "application/vnd.github+json",
        Authorization: `Bearer ${this.options.token}`,
        "X-GitHub-Api-Version": "2022-11-28",
        ...(body ? { "Content-Type": "application/json" } : {}),
      },
      body: body ? JSON.stringify(body) : undefined,
      dispatcher: this.options.dispatcher,
    });
    const text = await res.text();
    if (res.status === 404 && method === "GET") return null;
    if (!res.ok) {
      throw remoteErrorFor(res.status, `github ${method} ${path}: HTTP ${res.status} ${text.slice(0, 200)}`);
    }
    return text ? JSON.parse(text) : {};
  }
}
