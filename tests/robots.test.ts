import { afterEach, describe, expect, test, vi } from "vitest";
import { loadRobotsPolicy, normalizeRulePath, parseRobotsTxt } from "../src/robots";
import { DomainThrottle } from "../src/throttle";

const ROBOTS = [
  "User-agent: *",
  "Disallow: /private",
  "Allow: /private/open",
  "Disallow: /*.pdf$",
  "Crawl-delay: 2",
  "",
  "# crawler specific",
  "User-agent: civicrawl",
  "User-agent: other",
  "Disallow: /bot-only",
].join("\n");

describe("parseRobotsTxt", () => {
  test("applies the wildcard group", () => {
    const policy = parseRobotsTxt(ROBOTS, "somebot/1.0");
    expect(policy.source).toBe("robots.txt");
    expect(policy.crawlDelayMs).toBe(2000);
    expect(policy.isAllowed("/private/x")).toBe(false);
    expect(policy.isAllowed("/private/open/1")).toBe(true);
    expect(policy.isAllowed("/files/doc.pdf")).toBe(false);
    expect(policy.isAllowed("/files/doc.pdf?download=1")).toBe(true);
    expect(policy.isAllowed("/public")).toBe(true);
  });

  test("a named group shared by consecutive user-agent lines wins", () => {
    const policy = parseRobotsTxt(ROBOTS, "civicrawl/0.1");
    expect(policy.isAllowed("/bot-only/page")).toBe(false);
    expect(policy.isAllowed("/private/x")).toBe(true);
    expect(policy.crawlDelayMs).toBeUndefined();

    expect(parseRobotsTxt(ROBOTS, "Other").isAllowed("/bot-only")).toBe(false);
  });

  test("an empty disallow allows everything", () => {
    const policy = parseRobotsTxt("User-agent: *\nDisallow:\n", "any");
    expect(policy.isAllowed("/anything")).toBe(true);
  });

  test("rule paths gain a leading slash", () => {
    expect(normalizeRulePath("admin")).toBe("/admin");
    expect(normalizeRulePath("*.php")).toBe("*.php");
  });
});

describe("loadRobotsPolicy", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const options = { userAgent: "test-agent/1.0", timeoutMs: 1000 };

  test("a missing robots.txt allows everything", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("not found", { status: 404 }))
    );
    const policy = await loadRobotsPolicy(new URL("https://a.example/page"), options);
    expect(policy.source).toBe("allow-all");
    expect(policy.isAllowed("/page")).toBe(true);
  });

  test("a server error or rate limit disallows everything", async () => {
    for (const status of [500, 503, 429]) {
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => new Response("busy", { status }))
      );
      const policy = await loadRobotsPolicy(new URL("https://a.example/page"), options);
      expect(policy.source).toBe("unreachable");
      expect(policy.isAllowed("/page")).toBe(false);
    }
  });
});

async function visit(
  throttle: DomainThrottle,
  host: string,
  crawlDelayMs: number,
  task: () => Promise<void>
): Promise<void> {
  const release = await throttle.acquire(host, crawlDelayMs);
  try {
    await task();
  } finally {
    release();
  }
}

describe("DomainThrottle", () => {
  function fakeClock(): { now: () => number; sleep: (ms: number) => Promise<void> } {
    let time = 0;
    return {
      now: () => time,
      sleep: async (ms) => {
        time += ms;
      },
    };
  }

  test("spaces request starts on one host by the larger of interval and crawl-delay", async () => {
    const clock = fakeClock();
    const throttle = new DomainThrottle({
      perDomainConcurrency: 1,
      minIntervalMs: 1000,
      ...clock,
    });
    const starts: number[] = [];
    const task = async (): Promise<void> => {
      starts.push(clock.now());
    };

    await Promise.all([
      visit(throttle, "a.example", 2500, task),
      visit(throttle, "a.example", 2500, task),
      visit(throttle, "a.example", 0, task),
    ]);
    expect(starts).toEqual([0, 2500, 5000]);
  });

  test("hosts do not wait for each other", async () => {
    const clock = fakeClock();
    const throttle = new DomainThrottle({
      perDomainConcurrency: 2,
      minIntervalMs: 1000,
      ...clock,
    });
    const starts: string[] = [];

    await Promise.all(
      ["a.example", "b.example"].map((host) =>
        visit(throttle, host, 0, async () => {
          starts.push(`${host}@${clock.now()}`);
        })
      )
    );
    expect(starts.sort()).toEqual(["a.example@0", "b.example@0"]);
  });
});
