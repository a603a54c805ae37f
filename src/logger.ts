/**
 * Process-wide logger. Log lines and the progress bar go to stderr so that
 * stdout carries only command output (run stats, status JSON).
 */

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",

  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",

  clearLine: "\x1b[2K",
  cursorToStart: "\x1b[0G",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
} as const;

export type LogLevel = "debug" | "info" | "success" | "warn" | "error";

interface LoggerConfig {
  level: LogLevel;
  showProgress: boolean;
}

const levelRank: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in levelRank;
}

/** How one candidate left the fetch phase, as far as the progress bar cares. */
export type ProgressOutcome = "stored" | "dropped" | "failed";

interface ProgressState {
  label: string;
  current: number;
  total: number;
  currentUrl: string;
  stored: number;
  failures: number;
  startTime: number;
}

const PROGRESS_BAR_WIDTH = 24;
/** Label, bar and counters before the URL. */
const PROGRESS_FIXED_WIDTH = 60;
const MIN_TERMINAL_WIDTH = 80;

const levelStyles: Record<LogLevel, { color: string; prefix: string }> = {
  debug: { color: ANSI.gray, prefix: "DEBUG" },
  info: { color: ANSI.blue, prefix: "INFO" },
  success: { color: ANSI.green, prefix: "OK" },
  warn: { color: ANSI.yellow, prefix: "WARN" },
  error: { color: ANSI.red, prefix: "ERROR" },
};

class Logger {
  private config: LoggerConfig = { level: "info", showProgress: true };
  private progress: ProgressState | null = null;
  private lastProgressLine = "";
  private readonly isTerminal = process.stderr.isTTY ?? false;

  /** Restore the cursor on Ctrl+C. Completed JSONL lines are already on disk. */
  constructor() {
    const cleanup = (): void => {
      this.clearProgressLine();
      if (this.isTerminal) {
        process.stderr.write(ANSI.showCursor);
      }
    };

    for (const [signal, code] of [
      ["SIGINT", 130],
      ["SIGTERM", 143],
    ] as const) {
      process.on(signal, () => {
        cleanup();
        process.exit(code);
      });
    }

    process.on("exit", () => {
      if (this.isTerminal && this.progress) {
        process.stderr.write(ANSI.showCursor);
      }
    });
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  isEnabled(level: LogLevel): boolean {
    return levelRank[level] >= levelRank[this.config.level];
  }

  private formatMessage(level: LogLevel, message: string): string {
    const style = levelStyles[level];
    const timestamp =
      this.config.level === "debug"
        ? `${ANSI.dim}[${this.getTimestamp()}]${ANSI.reset} `
        : "";
    return `${timestamp}${style.color}${ANSI.bold}[${style.prefix}]${ANSI.reset} ${message}`;
  }

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  private getTerminalWidth(): number {
    return process.stderr.columns ?? MIN_TERMINAL_WIDTH;
  }

  private clearProgressLine(): void {
    if (this.isTerminal && this.lastProgressLine) {
      process.stderr.write(`${ANSI.cursorToStart}${ANSI.clearLine}`);
      this.lastProgressLine = "";
    }
  }

  private writeLog(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }
    this.clearProgressLine();
    console.error(this.formatMessage(level, message));
    this.renderProgress();
  }

  debug(message: string): void {
    this.writeLog("debug", message);
  }

  info(message: string): void {
    this.writeLog("info", message);
  }

  success(message: string): void {
    this.writeLog("success", message);
  }

  warn(message: string): void {
    this.writeLog("warn", message);
  }

  error(message: string): void {
    this.writeLog("error", message);
  }

  /** Progress bar for one phase of a run or round; a no-op with --no-progress. */
  startProgress(total: number, label: string): void {
    if (!this.config.showProgress) {
      return;
    }
    this.progress = {
      label,
      current: 0,
      total,
      currentUrl: "",
      stored: 0,
      failures: 0,
      startTime: Date.now(),
    };
    if (this.isTerminal) {
      process.stderr.write(ANSI.hideCursor);
    }
    this.renderProgress();
  }

  /** One candidate is done. */
  advanceProgress(url: string, outcome: ProgressOutcome): void {
    if (!this.progress) {
      return;
    }
    this.progress.current += 1;
    this.progress.currentUrl = url;
    if (outcome === "stored") {
      this.progress.stored += 1;
    } else if (outcome === "failed") {
      this.progress.failures += 1;
    }
    this.renderProgress();
  }

  endProgress(): void {
    this.clearProgressLine();
    if (this.isTerminal) {
      process.stderr.write(ANSI.showCursor);
    }
    const { progress } = this;
    this.progress = null;
    if (!progress) {
      return;
    }

    const elapsed = this.formatDuration(Date.now() - progress.startTime);
    const parts = [
      `${progress.current} processed`,
      `${ANSI.green}${progress.stored} stored${ANSI.reset}`,
    ];
    if (progress.failures > 0) {
      parts.push(`${ANSI.red}${progress.failures} failed${ANSI.reset}`);
    }
    this.info(
      `${ANSI.cyan}${ANSI.bold}${progress.label} done${ANSI.reset} in ${ANSI.bold}${elapsed}${ANSI.reset} (${parts.join(", ")})`
    );
  }

  private renderProgress(): void {
    if (!(this.progress && this.isTerminal)) {
      return;
    }

    const { label, current, total, currentUrl, stored, failures } = this.progress;
    const ratio = total > 0 ? Math.min(1, current / total) : 0;
    const filled = Math.round(ratio * PROGRESS_BAR_WIDTH);
    const bar = `${ANSI.green}${"█".repeat(filled)}${ANSI.gray}${"░".repeat(PROGRESS_BAR_WIDTH - filled)}${ANSI.reset}`;
    const counts = `${current}/${total} +${stored}${failures > 0 ? ` ${ANSI.red}!${failures}${ANSI.reset}` : ""}`;
    const eta = this.calculateEta();

    const maxUrlLength = Math.max(20, this.getTerminalWidth() - PROGRESS_FIXED_WIDTH);
    const progressLine = `${ANSI.cursorToStart}${ANSI.clearLine}${ANSI.bold}${label}${ANSI.reset} ${bar} ${counts} ${ANSI.dim}${eta ? `ETA ${eta}` : ""}${ANSI.reset} ${ANSI.cyan}${this.truncateUrl(currentUrl, maxUrlLength)}${ANSI.reset}`;

    this.lastProgressLine = progressLine;
    process.stderr.write(progressLine);
  }

  /** Keeps the host and the tail of the path, which is where board post numbers live. */
  private truncateUrl(url: string, maxLength: number): string {
    if (url.length <= maxLength) {
      return url;
    }
    const parsed = tryParseUrl(url);
    const host = parsed ? parsed.hostname : "";
    const tail = parsed ? `${parsed.pathname}${parsed.search}` : url;
    const room = maxLength - host.length - 3;
    return room > 8 ? `${host}...${tail.slice(-room)}` : `...${tail.slice(-(maxLength - 3))}`;
  }

  private formatDuration(ms: number): string {
    if (ms < 1000) {
      return `${Math.round(ms)}ms`;
    }
    const seconds = Math.floor(ms / 1000);
    return seconds < 60 ? `${seconds}s` : `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
  }

  /** Linear estimate from the average time per finished candidate. */
  private calculateEta(): string {
    const progress = this.progress;
    if (!progress || progress.current === 0 || progress.current >= progress.total) {
      return "";
    }
    const perItem = (Date.now() - progress.startTime) / progress.current;
    return this.formatDuration(perItem * (progress.total - progress.current));
  }

  logFetch(url: string, attempt: number, maxAttempts: number): void {
    this.debug(`Fetching (${attempt}/${maxAttempts}): ${url}`);
  }

  logFetchError(url: string, attempt: number, error: string): void {
    this.debug(`Fetch attempt ${attempt} failed for ${url}: ${error}`);
  }

  logStored(source: string, url: string): void {
    this.debug(`Stored ${ANSI.cyan}${url}${ANSI.reset} ${ANSI.dim}(${source})${ANSI.reset}`);
  }

  logBlocked(url: string, reason: string): void {
    this.debug(
      `${ANSI.yellow}Blocked${ANSI.reset} ${url} ${ANSI.dim}(${reason})${ANSI.reset}`
    );
  }

  logSkipped(message: string): void {
    this.debug(`Skipped: ${message}`);
  }

  logItemFailure(stage: string, url: string, error: string): void {
    this.warn(`${stage} failed for ${url}: ${error}`);
  }

  /**
   * Print a run configuration block at debug level.
   */
  logRunStart(title: string, config: Record<string, unknown>): void {
    if (!this.isEnabled("debug")) {
      return;
    }
    this.debug(`${ANSI.cyan}${ANSI.bold}${title}${ANSI.reset}`);
    for (const [key, value] of Object.entries(config)) {
      const shown = typeof value === "string" ? value : JSON.stringify(value);
      this.debug(`  ${ANSI.dim}${key}:${ANSI.reset} ${shown}`);
    }
  }

  /** Outcome counters after a run or round, one row per source. */
  printSummary(title: string, rows: Array<[string, string | number]>): void {
    if (!this.isEnabled("info")) {
      return;
    }
    this.clearProgressLine();
    console.error(`\n${ANSI.cyan}${ANSI.bold}${title}${ANSI.reset}`);
    for (const [label, value] of rows) {
      console.error(`  ${ANSI.dim}${label}:${ANSI.reset} ${value}`);
    }
  }
}

function tryParseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}

export const logger = new Logger();
