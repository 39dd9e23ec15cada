import fs from "node:fs";
import path from "node:path";
import type { Logger, LogLevel } from "../../logger.js";
import { errorMessage, isoNow, yyyyMmDdUtc } from "../../utils.js";

/**
 * One diagnostic line written by the core.
 */
export interface OperationEntry {
  ts: string;
  level: LogLevel;
  /** Stable dotted code, e.g. `poll.failed`, `install.finished`. */
  code: string;
  message: string;
  payload?: Record<string, unknown>;
}

/**
 * Sink for the core's diagnostic lines (poll failures, install start/end, outcomes).
 *
 * `write` must not throw and must not block the caller.
 */
export interface OperationLog {
  write(level: LogLevel, code: string, message: string, payload?: Record<string, unknown>): void;
  close(): Promise<void>;
}

interface DayStream {
  day: string;
  filePath: string;
  writer: fs.WriteStream;
  errored: boolean;
}

/**
 * Append-only JSONL operation log under `<dataDir>/logs/operations-YYYY-MM-DD.jsonl`.
 *
 * A new file is opened when the UTC date changes. Entries are optionally
 * mirrored to the stderr {@link Logger}. Persistence is best-effort: a day whose
 * directory or stream failed is reported once and its later entries are
 * counted as dropped.
 */
export class JsonlOperationLog implements OperationLog {
  private readonly logDir: string;
  private current: DayStream | null = null;
  /** Day whose log directory could not be created. */
  private unavailableDay: string | null = null;
  private droppedDueToError = 0;
  private closed = false;

  public constructor(dataDir: string, private readonly mirror?: Logger) {
    this.logDir = path.join(dataDir, "logs");
  }

  /** Path of the file currently written to, if any entry was written yet. */
  public get currentFile(): string | undefined {
    return this.current?.filePath;
  }

  public get dropped(): number {
    return this.droppedDueToError;
  }

  public write(level: LogLevel, code: string, message: string, payload?: Record<string, unknown>): void {
    this.mirror?.log(level, message, payload ? { code, ...payload } : { code });
    if (this.closed) return;

    const entry: OperationEntry = { ts: isoNow(), level, code, message, payload };
    const stream = this.streamFor(yyyyMmDdUtc(entry.ts));
    if (!stream || stream.errored) {
      this.droppedDueToError++;
      return;
    }
    stream.writer.write(`${JSON.stringify(entry)}\n`);
  }

  /**
   * Flush and close the current file. Later writes only reach the mirror.
   */
  public async close(): Promise<void> {
    this.closed = true;
    const stream = this.current;
    this.current = null;
    if (!stream || stream.errored) return;
    await new Promise<void>((resolve) => {
      stream.writer.end(() => resolve());
    });
  }

  private streamFor(day: string): DayStream | null {
    if (this.current && this.current.day === day) return this.current;
    if (this.unavailableDay === day) return null;

    const previous = this.current;
    if (previous && !previous.errored) {
      previous.writer.end();
    }

    try {
      fs.mkdirSync(this.logDir, { recursive: true });
    } catch (err) {
      this.mirror?.warn("Operation log directory unavailable", {
        dir: this.logDir,
        error: errorMessage(err),
      });
      this.current = null;
      this.unavailableDay = day;
      return null;
    }

    const filePath = path.join(this.logDir, `operations-${day}.jsonl`);
    const stream: DayStream = {
      day,
      filePath,
      writer: fs.createWriteStream(filePath, { flags: "a" }),
      errored: false,
    };
    stream.writer.on("error", (err) => {
      stream.errored = true;
      this.mirror?.warn("Operation log write failed", { file: filePath, error: err.message });
    });
    this.current = stream;
    return stream;
  }
}
