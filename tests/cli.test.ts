import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test, vi } from "vitest";
import { main } from "../src/cli";
import { logger } from "../src/logger";

afterEach(() => {
  process.exitCode = undefined;
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("main", () => {
  test("an unreadable config file exits with status 1", async () => {
    const errors = vi.spyOn(logger, "error").mockImplementation(() => undefined);
    const dir = await mkdtemp(path.join(os.tmpdir(), "cli-"));
    try {
      await main(["run", "--config", path.join(dir, "missing.yaml"), "--no-progress"]);
      expect(process.exitCode).toBe(1);
      expect(errors).toHaveBeenCalledTimes(1);
      expect(String(errors.mock.calls[0]?.[0])).toContain("Cannot read config");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test("asking for the video source without a key exits with status 1", async () => {
    vi.stubEnv("YOUTUBE_API_KEY", "");
    const errors = vi.spyOn(logger, "error").mockImplementation(() => undefined);
    const dir = await mkdtemp(path.join(os.tmpdir(), "cli-"));
    try {
      const configPath = path.join(dir, "params.yaml");
      await writeFile(configPath, "keywords:\n  - 국민연금\n", "utf8");
      await main([
        "run",
        "--config",
        configPath,
        "--data-dir",
        path.join(dir, "data"),
        "--only",
        "youtube",
        "--no-progress",
      ]);
      expect(process.exitCode).toBe(1);
      expect(String(errors.mock.calls[0]?.[0])).toContain("YOUTUBE_API_KEY is not set");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test("a successful command leaves the exit code alone", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    await main(["--version"]);
    expect(process.exitCode).toBeUndefined();
    expect(log).toHaveBeenCalledTimes(1);
  });
});
