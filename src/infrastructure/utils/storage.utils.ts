import { existsSync, readdirSync } from "node:fs";
import { basename, extname, join, relative } from "node:path";

/** Relative paths of every file under `dir`, recursively. */
export function listFilesRecursive(dir: string, base: string = dir, results: string[] = []): string[] {
  if (!existsSync(dir)) return results;
  const entries = readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      listFilesRecursive(full, base, results);
    } else {
      results.push(normalizeRelativePath(relative(base, full)));
    }
  }
  return results.sort();
}

export function normalizeRelativePath(p: string): string {
  if (!p) return "";
  return p.replace(/\\/g, "/").replace(/^\/+/, "").replace(/\/+$/, "");
}

/** File name without directory or extension, safe as a folder name. */
export function documentStem(fileName: string): string {
  const name = basename(fileName.replace(/\\/g, "/"));
  const stem = name.slice(0, name.length - extname(name).length) || name;
  return stem.replace(/[<>:"|?*]/g, "_").trim();
}

export function pageLabel(page: number): string {
  return String(page).padStart(2, "0");
}
