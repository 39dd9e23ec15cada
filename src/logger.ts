/**
 * Terminal logger for sideload-mcp.
 *
 * Lines go to stderr (stdout carries MCP traffic) as
 * `HH:MM:SS.mmm [LEVEL] message {meta}`, colored when stderr is a TTY.
 */

/** Log level type (matches config schema). */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** Destination for rendered log lines. Defaults to stderr. */
export type LogSink = (chunk: string) => void;

const SGR = {
  reset: 0,
  bold: 1,
  dim: 2,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  cyan: 36,
  white: 37,
  gray: 90,
} as const;

type Sgr = keyof typeof SGR;

const LEVELS: Record<LogLevel, { rank: number; tag: string; style: Sgr[] }> = {
  debug: { rank: 0, tag: "[DEBUG]", style: ["dim", "blue"] },
  info: { rank: 1, tag: "[INFO ]", style: ["cyan"] },
  warn: { rank: 2, tag: "[WARN ]", style: ["yellow"] },
  error: { rank: 3, tag: "[ERROR]", style: ["red", "bold"] },
};

const ESCAPE_RE = /\x1b\[[0-9;]*m/g;

function paint(color: boolean, text: string, ...style: Sgr[]): string {
  if (!color || style.length === 0) return text;
  return `\x1b[${style.map((s) => SGR[s]).join(";")}m${text}\x1b[${SGR.reset}m`;
}

function visibleLength(text: string): number {
  return text.replace(ESCAPE_RE, "").length;
}

function clock(at: Date): string {
  const two = (n: number) => String(n).padStart(2, "0");
  return `${two(at.getHours())}:${two(at.getMinutes())}:${two(at.getSeconds())}.${String(at.getMilliseconds()).padStart(3, "0")}`;
}

/**
 * Render one log line (newline included). Empty meta is omitted.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  meta: Record<string, unknown> | undefined,
  at: Date,
  color: boolean
): string {
  const { tag, style } = LEVELS[level];
  let line = `${paint(color, clock(at), "gray")} ${paint(color, tag, ...style)} ${message}`;
  if (meta && Object.keys(meta).length > 0) {
    line += ` ${paint(color, JSON.stringify(meta), "dim")}`;
  }
  return `${line}\n`;
}

/**
 * Render label/value rows inside a rounded frame headed by `title`.
 */
export function formatPanel(title: string, rows: Array<[string, string]>, color: boolean): string {
  const labelWidth = rows.reduce((w, [label]) => Math.max(w, label.length), 0);
  const body = rows.map(([label, value]) => `${paint(color, label.padEnd(labelWidth), "cyan")}  ${value}`);
  const width = Math.max(title.length + 2, ...body.map(visibleLength));

  const frame = (s: string) => paint(color, s, "green");
  const top = `${frame("╭─")}${paint(color, ` ${title} `, "bold")}${frame(`${"─".repeat(width - title.length - 2)}─╮`)}`;
  const middle = body.map((line) => `${frame("│")} ${line}${" ".repeat(width - visibleLength(line))} ${frame("│")}`);
  const bottom = frame(`╰${"─".repeat(width + 2)}╯`);
  return [top, ...middle, bottom].join("\n");
}

const stderrSink: LogSink = (chunk) => {
  process.stderr.write(chunk);
};

export class Logger {
  private readonly color: boolean;

  /**
   * @param color - Emit ANSI styles; defaults to on only for a TTY stderr
   */
  constructor(
    private readonly minLevel: LogLevel = "info",
    private readonly sink: LogSink = stderrSink,
    color?: boolean
  ) {
    this.color = color ?? (sink === stderrSink && process.stderr.isTTY === true);
  }

  enabled(level: LogLevel): boolean {
    return LEVELS[level].rank >= LEVELS[this.minLevel].rank;
  }

  printBanner(info: { transport: string; dataDir: string; adb: string; pollIntervalMs: number }): void {
    const c = this.color;
    const panel = formatPanel(
      "sideload-mcp",
      [
        ["transport", info.transport],
        ["data-dir", paint(c, info.dataDir, "dim")],
        ["adb", paint(c, info.adb, "dim")],
        ["poll", `every ${info.pollIntervalMs}ms`],
      ],
      c
    );
    const ready = `${paint(c, "▸", "green", "bold")} adb install queue ready ${paint(c, `(${info.transport})`, "dim")}`;
    this.sink(`\n${panel}\n${ready}\n\n`);
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.enabled(level)) return;
    this.sink(formatLogLine(level, message, meta, new Date(), this.color));
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }
}
