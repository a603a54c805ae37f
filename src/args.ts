import type { CrawlerConfig } from "./config";
import type { SourceSelection } from "./crawl";
import { isLogLevel, logger, type LogLevel } from "./logger";

export interface CommonOptions {
  configPath?: string;
  dataDir?: string;
  logLevel: LogLevel;
  progress: boolean;
}

export interface RunCommandOptions extends CommonOptions {
  selection: SourceSelection;
  maxFetch: number | null;
}

/** Flags that replace the `autocrawl` block of the config for one invocation. */
export interface AutocrawlOverrides {
  monthsBack?: number;
  monthlyTarget?: number;
  maxGdeltWindows?: number;
  maxYoutubeWindows?: number;
  maxYoutubeKeywords?: number;
  maxForumsWindows?: number;
  includeForums?: boolean;
  maxFetch?: number;
}

export interface AutocrawlRunOptions extends CommonOptions {
  selection: SourceSelection;
  rounds: number;
  sleepSeconds: number;
  overrides: AutocrawlOverrides;
}

export type ParseResult =
  | { command: "help"; topic: HelpTopic }
  | { command: "version" }
  | { command: "run"; options: RunCommandOptions }
  | { command: "autocrawl-status"; options: CommonOptions }
  | { command: "autocrawl-run"; options: AutocrawlRunOptions }
  | { command: "dedup"; input: string; output: string; options: CommonOptions }
  | {
      command: "merge";
      existing: string;
      batch: string;
      output: string;
      options: CommonOptions;
    };

export type HelpTopic = "general" | "run" | "autocrawl" | "dedup" | "merge";

/** Bad command line; the CLI prints usage before the message. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const DEFAULT_ROUNDS = 1;
const DEFAULT_SLEEP_SECONDS = 0;

export function printHelp(): void {
  const lines = [
    "Usage:",
    "  civicrawl run [options]                      (one crawl of the configured window)",
    "  civicrawl autocrawl status [options]         (monthly counts and quota as JSON)",
    "  civicrawl autocrawl run [options]            (deficit-driven rounds)",
    "  civicrawl dedup <in.jsonl> <out.jsonl>       (exact dedup of a JSONL file)",
    "  civicrawl merge <existing> <batch> <out>     (merge two JSONL files)",
    "",
    "Common options:",
    "  --config <path>        Parameters file (default config/params.yaml)",
    "  --data-dir <path>      Output root, overrides output.root and CRAWL_DATA_DIR",
    "  --log-level <level>    debug | info | warn | error (default info)",
    "  --verbose              Same as --log-level debug",
    "  --no-progress          Disable the progress bar",
    "  --help                 Show help for a command",
    "  --version              Print the version",
    "",
    "Run `civicrawl <command> --help` for command options.",
  ];
  console.info(lines.join("\n"));
}

export function printRunHelp(): void {
  const lines = [
    "Usage: civicrawl run [options]",
    "",
    "Options:",
    "  --only <list>          Comma-separated sources or groups (gdelt,youtube,forums,<site>)",
    "  --sites <list>         Comma-separated forum sites to keep",
    "  --no-gdelt             Skip the news index",
    "  --max-fetch <n>        Stop starting fetches after n items",
    "",
    "Prints the run statistics as JSON on stdout.",
  ];
  console.info(lines.join("\n"));
}

export function printAutocrawlHelp(): void {
  const lines = [
    "Usage:",
    "  civicrawl autocrawl status [--config <path>]",
    "  civicrawl autocrawl run [options]",
    "",
    "Run options:",
    "  --rounds <n>                 Rounds to run (default 1)",
    "  --sleep-sec <n>              Pause between rounds (default 0)",
    "  --months-back <n>            Months considered, newest first",
    "  --monthly-target <n>         Documents wanted per source group and month",
    "  --max-gdelt-windows <n>      News-index months per round",
    "  --max-youtube-windows <n>    Video months per round",
    "  --max-youtube-keywords <n>   Keywords per video month",
    "  --max-forums-windows <n>     Forum months per round",
    "  --include-forums             Schedule forums",
    "  --no-forums                  Do not schedule forums",
    "  --max-fetch <n>              Fetch cap per round",
    "  --only <list>                Restrict sources as for `run`",
    "  --sites <list>               Restrict forum sites as for `run`",
    "  --no-gdelt                   Skip the news index",
  ];
  console.info(lines.join("\n"));
}

export function printDedupHelp(): void {
  console.info(
    [
      "Usage: civicrawl dedup <in.jsonl> <out.jsonl>",
      "",
      "Keeps the first record of every exact duplicate and prints counts as JSON.",
    ].join("\n")
  );
}

export function printMergeHelp(): void {
  console.info(
    [
      "Usage: civicrawl merge <existing.jsonl> <batch.jsonl> <out.jsonl>",
      "",
      "Existing records win over batch records with the same id; output is",
      "sorted ascending by (published_at, id), undated records first.",
    ].join("\n")
  );
}

export const HELP_PRINTERS: Record<HelpTopic, () => void> = {
  general: printHelp,
  run: printRunHelp,
  autocrawl: printAutocrawlHelp,
  dedup: printDedupHelp,
  merge: printMergeHelp,
};

function parseCount(flag: string, raw: string | undefined, min: number): number {
  if (raw === undefined || raw.trim() === "") {
    throw new UsageError(`${flag} needs a value`);
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new UsageError(`${flag} expects an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function parseList(flag: string, raw: string | undefined): string[] {
  const values = (raw ?? "")
    .split(",")
    .map((value) => value.trim().toLowerCase())
    .filter((value) => value.length > 0);
  if (values.length === 0) {
    throw new UsageError(`${flag} needs a comma-separated list`);
  }
  return values;
}

export function parseArgs(args: string[]): ParseResult {
  const common: CommonOptions = { logLevel: "info", progress: true };
  const selection: SourceSelection = { only: null, sites: null, noGdelt: false };
  const overrides: AutocrawlOverrides = {};
  let maxFetch: number | null = null;
  let rounds = DEFAULT_ROUNDS;
  let sleepSeconds = DEFAULT_SLEEP_SECONDS;
  let showHelp = false;
  let showVersion = false;

  const iterator = args[Symbol.iterator]();
  const positionalArgs: string[] = [];

  const consumeNext = (valueFromEq: string | undefined): string | undefined => {
    if (valueFromEq) {
      return valueFromEq;
    }
    const next = iterator.next();
    return next.done ? undefined : next.value;
  };

  const handlers: Record<string, (valueFromEq: string | undefined) => void> = {
    "--config": (valueFromEq) => {
      common.configPath = consumeNext(valueFromEq);
    },
    "--data-dir": (valueFromEq) => {
      common.dataDir = consumeNext(valueFromEq);
    },
    "--log-level": (valueFromEq) => {
      const raw = consumeNext(valueFromEq)?.toLowerCase() ?? "";
      if (!isLogLevel(raw)) {
        throw new UsageError(`Unknown log level "${raw}"`);
      }
      common.logLevel = raw;
    },
    "--verbose": () => {
      common.logLevel = "debug";
    },
    "--no-progress": () => {
      common.progress = false;
    },
    "--only": (valueFromEq) => {
      selection.only = parseList("--only", consumeNext(valueFromEq));
    },
    "--sites": (valueFromEq) => {
      selection.sites = parseList("--sites", consumeNext(valueFromEq));
    },
    "--no-gdelt": () => {
      selection.noGdelt = true;
    },
    "--max-fetch": (valueFromEq) => {
      maxFetch = parseCount("--max-fetch", consumeNext(valueFromEq), 1);
      overrides.maxFetch = maxFetch;
    },
    "--rounds": (valueFromEq) => {
      rounds = parseCount("--rounds", consumeNext(valueFromEq), 1);
    },
    "--sleep-sec": (valueFromEq) => {
      sleepSeconds = parseCount("--sleep-sec", consumeNext(valueFromEq), 0);
    },
    "--months-back": (valueFromEq) => {
      overrides.monthsBack = parseCount("--months-back", consumeNext(valueFromEq), 1);
    },
    "--monthly-target": (valueFromEq) => {
      overrides.monthlyTarget = parseCount("--monthly-target", consumeNext(valueFromEq), 1);
    },
    "--max-gdelt-windows": (valueFromEq) => {
      overrides.maxGdeltWindows = parseCount("--max-gdelt-windows", consumeNext(valueFromEq), 0);
    },
    "--max-youtube-windows": (valueFromEq) => {
      overrides.maxYoutubeWindows = parseCount("--max-youtube-windows", consumeNext(valueFromEq), 0);
    },
    "--max-youtube-keywords": (valueFromEq) => {
      overrides.maxYoutubeKeywords = parseCount(
        "--max-youtube-keywords",
        consumeNext(valueFromEq),
        1
      );
    },
    "--max-forums-windows": (valueFromEq) => {
      overrides.maxForumsWindows = parseCount("--max-forums-windows", consumeNext(valueFromEq), 0);
    },
    "--include-forums": () => {
      overrides.includeForums = true;
    },
    "--no-forums": () => {
      overrides.includeForums = false;
    },
    "--help": () => {
      showHelp = true;
    },
    "-h": () => {
      showHelp = true;
    },
    "--version": () => {
      showVersion = true;
    },
  };

  for (const arg of iterator) {
    const [flag = "", valueFromEq] = arg.split("=", 2);
    const handler = handlers[flag];
    if (handler) {
      handler(valueFromEq);
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option "${arg}"`);
    } else {
      positionalArgs.push(arg);
    }
  }

  if (showVersion) {
    return { command: "version" };
  }

  const [command, ...rest] = positionalArgs;
  const warnExtraArgs = (extras: string[]): void => {
    if (extras.length > 0) {
      logger.warn(`Ignoring extra positional arguments: ${extras.join(", ")}`);
    }
  };

  if (command === undefined) {
    return { command: "help", topic: "general" };
  }

  if (command === "run") {
    if (showHelp) {
      return { command: "help", topic: "run" };
    }
    warnExtraArgs(rest);
    return { command: "run", options: { ...common, selection, maxFetch } };
  }

  if (command === "autocrawl") {
    const [action, ...extras] = rest;
    if (showHelp || action === undefined) {
      return { command: "help", topic: "autocrawl" };
    }
    warnExtraArgs(extras);
    if (action === "status") {
      return { command: "autocrawl-status", options: common };
    }
    if (action === "run") {
      return {
        command: "autocrawl-run",
        options: { ...common, selection, rounds, sleepSeconds, overrides },
      };
    }
    throw new UsageError(`Unknown autocrawl action "${action}" (expected status or run)`);
  }

  if (command === "dedup") {
    if (showHelp) {
      return { command: "help", topic: "dedup" };
    }
    const [input, output, ...extras] = rest;
    if (!(input && output)) {
      throw new UsageError("dedup needs an input and an output path");
    }
    warnExtraArgs(extras);
    return { command: "dedup", input, output, options: common };
  }

  if (command === "merge") {
    if (showHelp) {
      return { command: "help", topic: "merge" };
    }
    const [existing, batch, output, ...extras] = rest;
    if (!(existing && batch && output)) {
      throw new UsageError("merge needs existing, batch and output paths");
    }
    warnExtraArgs(extras);
    return { command: "merge", existing, batch, output, options: common };
  }

  if (command === "help") {
    return { command: "help", topic: "general" };
  }

  throw new UsageError(`Unknown command "${command}"`);
}

export function applyAutocrawlOverrides(
  config: CrawlerConfig,
  overrides: AutocrawlOverrides
): CrawlerConfig {
  const { autocrawl } = config;
  return {
    ...config,
    autocrawl: {
      ...autocrawl,
      monthsBack: overrides.monthsBack ?? autocrawl.monthsBack,
      monthlyTarget: overrides.monthlyTarget ?? autocrawl.monthlyTarget,
      includeForums: overrides.includeForums ?? autocrawl.includeForums,
      round: {
        maxFetch: overrides.maxFetch ?? autocrawl.round.maxFetch,
        maxGdeltWindows: overrides.maxGdeltWindows ?? autocrawl.round.maxGdeltWindows,
        maxYoutubeWindows: overrides.maxYoutubeWindows ?? autocrawl.round.maxYoutubeWindows,
        maxYoutubeKeywords: overrides.maxYoutubeKeywords ?? autocrawl.round.maxYoutubeKeywords,
        maxForumsWindows: overrides.maxForumsWindows ?? autocrawl.round.maxForumsWindows,
      },
    },
  };
}
