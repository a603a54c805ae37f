import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { emptyAutoState, type AutoStateData } from "../src/auto-state";
import { buildConfig, parseParams } from "../src/config";
import { QuotaLedger } from "../src/quota";
import {
  advanceCursor,
  autocrawlStatus,
  planRound,
  rankDeficits,
  videoPicks,
  type PlanSettings,
} from "../src/scheduler";
import { recentMonths } from "../src/utils";

const NOW = new Date("2024-06-15T00:00:00Z");

function stateWith(counts: AutoStateData["counts"], cursor = 0): AutoStateData {
  return { ...emptyAutoState(), counts, youtube_kw_cursor: cursor };
}

function settings(overrides: Partial<PlanSettings> = {}): PlanSettings {
  return {
    monthsBack: 3,
    monthlyTarget: 10,
    maxWindows: { gdelt: 3, youtube: 2, forums: 1 },
    maxYoutubeKeywords: 2,
    keywords: ["k1", "k2", "k3"],
    enabled: { gdelt: true, youtube: true, forums: true },
    ...overrides,
  };
}

function ledger(dailyQuota: number, reserveQuota: number): QuotaLedger {
  return new QuotaLedger({ youtube: { dailyQuota, reserveQuota } });
}

describe("rankDeficits", () => {
  test("the month with the largest shortfall comes first", () => {
    const state = stateWith({
      "2024-04": { gdelt: 10 },
      "2024-05": { gdelt: 2 },
      "2024-06": { gdelt: 10 },
    });
    const ranked = rankDeficits(state, "gdelt", recentMonths(NOW, 3), 10);
    expect(ranked.map((entry) => [entry.month, entry.count, entry.deficit])).toEqual([
      ["2024-05", 2, 8],
    ]);
  });

  test("equal deficits prefer the more recent month", () => {
    const ranked = rankDeficits(emptyAutoState(), "forums", recentMonths(NOW, 3), 10);
    expect(ranked.map((entry) => entry.month)).toEqual(["2024-06", "2024-05", "2024-04"]);
    expect(ranked[0]?.window).toEqual({
      start: new Date("2024-06-01T00:00:00Z"),
      end: NOW,
    });
  });
});

describe("videoPicks", () => {
  test("walks the keyword list round-robin from the cursor", () => {
    const windows = rankDeficits(emptyAutoState(), "youtube", recentMonths(NOW, 2), 5);
    const picks = videoPicks(windows, ["a", "b", "c"], 2, 2);
    expect(picks.map((pick) => `${pick.month}:${pick.keyword}`)).toEqual([
      "2024-06:c",
      "2024-06:a",
      "2024-05:b",
      "2024-05:c",
    ]);
    expect(picks.every((pick) => pick.cost === 101)).toBe(true);
  });

  test("never repeats a keyword inside one window", () => {
    const windows = rankDeficits(emptyAutoState(), "youtube", recentMonths(NOW, 1), 5);
    expect(videoPicks(windows, ["only"], 3, 0).map((pick) => pick.keyword)).toEqual(["only"]);
    expect(videoPicks(windows, [], 3, 0)).toEqual([]);
  });
});

describe("advanceCursor", () => {
  const picks = videoPicks(
    rankDeficits(emptyAutoState(), "youtube", recentMonths(NOW, 1), 5),
    ["a", "b", "c"],
    3,
    1
  );

  test("moves past every pick that ran and wraps around", () => {
    expect(picks.map((pick) => pick.keyword)).toEqual(["b", "c", "a"]);
    expect(advanceCursor(1, 3, picks, () => true)).toBe(1);
    expect(advanceCursor(1, 3, picks.slice(0, 2), () => true)).toBe(0);
  });

  test("stops at the first pick that did not run", () => {
    expect(advanceCursor(1, 3, picks, (pick) => pick.keyword !== "c")).toBe(2);
    expect(advanceCursor(1, 3, picks, () => false)).toBe(1);
    expect(advanceCursor(4, 0, picks, () => true)).toBe(0);
  });
});

describe("planRound", () => {
  test("selects the deficit month and leaves the state alone", () => {
    const state = stateWith({
      "2024-04": { gdelt: 10, youtube: 10, forums: 10 },
      "2024-05": { gdelt: 2, youtube: 10, forums: 10 },
      "2024-06": { gdelt: 10, youtube: 10, forums: 10 },
    });
    const before = JSON.stringify(state);
    const plan = planRound(state, settings(), ledger(10_000, 0), NOW);

    expect(plan.gdelt.map((entry) => entry.month)).toEqual(["2024-05"]);
    expect(plan.youtube).toEqual([]);
    expect(plan.forums).toEqual([]);
    expect(plan.videoPicks).toEqual([]);
    expect(JSON.stringify(state)).toBe(before);
  });

  test("defers the picks that do not fit the remaining quota", () => {
    const plan = planRound(stateWith({}), settings(), ledger(1000, 700), NOW);

    expect(plan.quotaAvailable).toBe(300);
    expect(plan.videoPicks.map((pick) => `${pick.month}:${pick.keyword}`)).toEqual([
      "2024-06:k1",
      "2024-06:k2",
    ]);
    expect(plan.deferredPicks.map((pick) => `${pick.month}:${pick.keyword}`)).toEqual([
      "2024-05:k3",
      "2024-05:k1",
    ]);
    expect(plan.nextCursor).toBe(2);
  });

  test("disabled groups get no windows", () => {
    const plan = planRound(
      stateWith({}),
      settings({ enabled: { gdelt: false, youtube: true, forums: false } }),
      ledger(10_000, 0),
      NOW
    );
    expect(plan.gdelt).toEqual([]);
    expect(plan.forums).toEqual([]);
    expect(plan.youtube.map((entry) => entry.month)).toEqual(["2024-06", "2024-05"]);
  });

  test("usage on one day never passes daily minus reserve", () => {
    const quota = ledger(1000, 300);
    let state = stateWith({});
    for (let round = 0; round < 6; round += 1) {
      const plan = planRound(state, settings(), quota, NOW);
      const cost = plan.videoPicks.reduce((sum, pick) => sum + pick.cost, 0);
      quota.charge("youtube", cost, NOW);
      state = { ...state, youtube_kw_cursor: plan.nextCursor };
      expect(quota.usedToday("youtube", NOW)).toBeLessThanOrEqual(700);
    }
    expect(quota.usedToday("youtube", NOW)).toBe(606);
    expect(quota.available("youtube", NOW)).toBe(94);
  });
});

describe("autocrawlStatus", () => {
  test("reports counts, deficits and quota from the state file", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "autocrawl-"));
    try {
      await writeFile(
        path.join(dir, "_auto_state.json"),
        JSON.stringify({
          version: 1,
          counts: { "2024-06": { gdelt: 2 } },
          stored_by_source: { gdelt: 2 },
          quota: { youtube: { date: "2024-06-15", units_used: 101 } },
          youtube_kw_cursor: 1,
          last_updated: "2024-06-14T23:00:00.000Z",
        }),
        "utf8"
      );
      const params = parseParams({
        autocrawl: {
          months_back: 2,
          monthly_target_per_source: 5,
          youtube: { daily_quota: 1000, reserve_quota: 200 },
        },
      });
      const config = buildConfig(params, ["국민연금"], {}, dir);

      const status = await autocrawlStatus(config, NOW);
      expect(status.months).toEqual([
        {
          month: "2024-05",
          counts: { gdelt: 0, youtube: 0, forums: 0 },
          deficits: { gdelt: 5, youtube: 5, forums: 5 },
        },
        {
          month: "2024-06",
          counts: { gdelt: 2, youtube: 0, forums: 0 },
          deficits: { gdelt: 3, youtube: 5, forums: 5 },
        },
      ]);
      expect(status.quota).toEqual({ date: "2024-06-15", units_used: 101, available: 699 });
      expect(status.youtube_kw_cursor).toBe(1);
      expect(status.stored_by_source).toEqual({ gdelt: 2 });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
