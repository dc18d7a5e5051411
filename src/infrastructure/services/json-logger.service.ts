import { createWriteStream, mkdirSync, existsSync, WriteStream } from "node:fs";
import { join } from "node:path";
import type { ILogger, LogEntry, LogLevel } from "../../core/domain/services/logger.service.js";

/** One JSON object per line in `<dir>/<name>_<runId>.jsonl`. */
export class JsonLogger implements ILogger {
  private logStream: WriteStream | null = null;
  private runId: string | undefined;

  constructor(
    private logDir: string,
    private logNameTemplate: string,
  ) {}

  init(runId: string): void {
    if (this.logStream) return;
    this.runId = runId;
    if (!existsSync(this.logDir)) mkdirSync(this.logDir, { recursive: true });
    const filename = this.logNameTemplate.replace(/\.[^.]+$/, "") + `_${runId}.jsonl`;
    this.logStream = createWriteStream(join(this.logDir, filename), { flags: "a" });
  }

  log(entry: LogEntry): void {
    if (this.logStream?.writable) {
      const full = {
        level: "info",
        runId: this.runId,
        ...entry,
        timestamp: new Date().toISOString(),
      };
      this.logStream.write(JSON.stringify(full) + "\n");
    }
  }

  close(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
  }
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/** `LEVEL\tevent\tmessage` lines for the CLI. */
export class ConsoleLogger implements ILogger {
  constructor(
    private minLevel: LogLevel = "info",
    private write: (line: string) => void = (line) => process.stderr.write(line),
  ) {}

  init(_runId: string): void {}

  log(entry: LogEntry): void {
    const level = entry.level ?? "info";
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    const where = [entry.sourceFile, entry.page !== undefined ? `p${entry.page}` : undefined]
      .filter((s) => s !== undefined)
      .join(" ");
    const message = [where, entry.message].filter(Boolean).join(": ");
    this.write(`${level.toUpperCase()}\t${entry.event}\t${message}\n`);
  }

  close(): void {}
}

export class CompositeLogger implements ILogger {
  constructor(private loggers: ILogger[]) {}

  init(runId: string): void {
    for (const l of this.loggers) l.init(runId);
  }

  log(entry: LogEntry): void {
    for (const l of this.loggers) l.log(entry);
  }

  close(): void {
    for (const l of this.loggers) l.close();
  }
}
