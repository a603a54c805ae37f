#!/usr/bin/env node
import {
  applyAutocrawlOverrides,
  HELP_PRINTERS,
  parseArgs,
  printHelp,
  type CommonOptions,
  UsageError,
} from "./args";
import { loadConfig, type CrawlerConfig } from "./config";
import { runCrawl } from "./crawl";
import { dedupJsonlFile } from "./dedup";
import { describeError } from "./errors";
import { mergeJsonlFiles } from "./io";
import { logger } from "./logger";
import { packageName, packageVersion } from "./package-info";
import { AutoCrawler, autocrawlStatus } from "./scheduler";
import { isMainModule } from "./utils";

const argv = process.argv.slice(2);

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

async function configFor(options: CommonOptions): Promise<CrawlerConfig> {
  logger.configure({
    level: options.logLevel,
    showProgress: options.progress,
  });
  return loadConfig({
    configPath: options.configPath,
    dataDir: options.dataDir,
    loadDotenv: true,
  });
}

export async function main(args: string[] = argv): Promise<void> {
  try {
    const result = parseArgs(args);

    if (result.command === "version") {
      console.log(`${packageName} ${packageVersion}`);
      return;
    }

    if (result.command === "help") {
      HELP_PRINTERS[result.topic]();
      return;
    }

    if (result.command === "dedup") {
      logger.configure({ level: result.options.logLevel, showProgress: false });
      const stats = await dedupJsonlFile(result.input, result.output);
      printJson(stats);
      return;
    }

    if (result.command === "merge") {
      logger.configure({ level: result.options.logLevel, showProgress: false });
      const stats = await mergeJsonlFiles(result.existing, result.batch, result.output);
      printJson(stats);
      return;
    }

    if (result.command === "autocrawl-status") {
      const config = await configFor(result.options);
      printJson(await autocrawlStatus(config));
      return;
    }

    if (result.command === "autocrawl-run") {
      const { options } = result;
      const config = applyAutocrawlOverrides(await configFor(options), options.overrides);
      const crawler = new AutoCrawler(config, { selection: options.selection });
      const rounds = await crawler.run(options.rounds, options.sleepSeconds);
      printJson(rounds.map((round) => ({ round: round.round, stats: round.stats })));
      return;
    }

    const config = await configFor(result.options);
    const stats = await runCrawl(config, {
      selection: result.options.selection,
      maxFetch: result.options.maxFetch ?? config.limits.maxFetchPerRun,
    });
    printJson(stats);
  } catch (error) {
    if (error instanceof UsageError) {
      printHelp();
      logger.error(error.message);
    } else {
      logger.error(describeError(error));
    }
    process.exitCode = 1;
  }
}

if (isMainModule(import.meta.url)) {
  main().catch((error: unknown) => {
    logger.error(describeError(error));
    process.exitCode = 1;
  });
}
