import { LINE_SPLIT_REGEX } from "./constants";
import { PermanentFetchError, describeError } from "./errors";
import { logger } from "./logger";
import { fetchWithTimeout } from "./network";
import type { RobotsPolicy } from "./types";

interface AgentRules {
  allow: string[];
  disallow: string[];
  crawlDelayMs?: number;
}

export function buildAllowAllPolicy(): RobotsPolicy {
  return {
    isAllowed: () => true,
    source: "allow-all",
  };
}

/** Used for the rest of the run when robots.txt answered 5xx or 429, or not at all. */
export function buildDisallowAllPolicy(): RobotsPolicy {
  return {
    isAllowed: () => false,
    source: "unreachable",
  };
}

export function normalizeRulePath(rule: string): string {
  if (!(rule.startsWith("/") || rule.startsWith("*"))) {
    return `/${rule}`;
  }
  return rule;
}

export function selectAgentPolicy(
  rules: Map<string, AgentRules>,
  userAgent: string
): AgentRules | undefined {
  const lowerUA = userAgent.toLowerCase();
  if (rules.has(lowerUA)) {
    return rules.get(lowerUA);
  }
  for (const [agent, policy] of rules.entries()) {
    if (agent !== "*" && lowerUA.includes(agent)) {
      return policy;
    }
  }
  return rules.get("*");
}

function compileRule(rule: string): (target: string) => boolean {
  if (!(rule.includes("*") || rule.endsWith("$"))) {
    return (target) => target.startsWith(rule);
  }
  const anchored = rule.endsWith("$");
  const body = anchored ? rule.slice(0, -1) : rule;
  const source = body
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  const pattern = new RegExp(`^${source}${anchored ? "$" : ""}`);
  return (target) => pattern.test(target);
}

/**
 * Longest matching rule wins; an allow ties with a disallow of equal length.
 * Rules are matched against path plus query string.
 */
function createEvaluator(
  allowRules: string[],
  disallowRules: string[]
): (target: string) => boolean {
  const allow = allowRules.map((rule) => ({ rule, test: compileRule(rule) }));
  const disallow = disallowRules.map((rule) => ({
    rule,
    test: compileRule(rule),
  }));

  return (target: string): boolean => {
    let longestAllow = "";
    let longestDisallow = "";
    for (const entry of allow) {
      if (entry.rule.length > longestAllow.length && entry.test(target)) {
        longestAllow = entry.rule;
      }
    }
    for (const entry of disallow) {
      if (entry.rule.length > longestDisallow.length && entry.test(target)) {
        longestDisallow = entry.rule;
      }
    }
    if (longestAllow.length === 0 && longestDisallow.length === 0) {
      return true;
    }
    return longestAllow.length >= longestDisallow.length;
  };
}

export function parseRobotsTxt(
  robotsText: string,
  userAgent: string
): RobotsPolicy {
  const rules = new Map<string, AgentRules>();
  const currentAgents = new Set<string>();
  // Consecutive user-agent lines share one group; a rule line closes it.
  let groupOpen = false;

  const ensureEntry = (agent: string): AgentRules => {
    const existing = rules.get(agent);
    if (existing) {
      return existing;
    }
    const created: AgentRules = { allow: [], disallow: [] };
    rules.set(agent, created);
    return created;
  };

  const applyToAgents = (handler: (entry: AgentRules) => void): void => {
    if (currentAgents.size === 0) {
      currentAgents.add("*");
    }
    groupOpen = false;
    for (const agent of currentAgents) {
      handler(ensureEntry(agent));
    }
  };

  for (const rawLine of robotsText.split(LINE_SPLIT_REGEX)) {
    const line = rawLine.split("#", 1)[0]?.trim();
    if (!line) {
      continue;
    }
    const separator = line.indexOf(":");
    if (separator === -1) {
      continue;
    }
    const directive = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (directive === "user-agent") {
      if (!groupOpen) {
        currentAgents.clear();
        groupOpen = true;
      }
      const agent = value.toLowerCase();
      currentAgents.add(agent);
      ensureEntry(agent);
      continue;
    }

    if (directive === "allow" && value) {
      applyToAgents((entry) => {
        entry.allow.push(normalizeRulePath(value));
      });
      continue;
    }

    if (directive === "disallow") {
      applyToAgents((entry) => {
        if (value) {
          entry.disallow.push(normalizeRulePath(value));
        }
      });
      continue;
    }

    if (directive === "crawl-delay") {
      const delaySeconds = Number.parseFloat(value);
      if (Number.isFinite(delaySeconds) && delaySeconds >= 0) {
        applyToAgents((entry) => {
          entry.crawlDelayMs = delaySeconds * 1000;
        });
      }
    }
  }

  const policy = selectAgentPolicy(rules, userAgent);
  if (!policy) {
    return buildAllowAllPolicy();
  }

  return {
    isAllowed: createEvaluator(policy.allow, policy.disallow),
    crawlDelayMs: policy.crawlDelayMs,
    source: "robots.txt",
  };
}

export interface RobotsOptions {
  userAgent: string;
  timeoutMs: number;
}

export async function loadRobotsPolicy(
  baseUrl: URL,
  options: RobotsOptions
): Promise<RobotsPolicy> {
  const robotsUrl = new URL("/robots.txt", baseUrl.origin).toString();
  try {
    const text = await fetchWithTimeout(
      robotsUrl,
      options.timeoutMs,
      options.userAgent
    );
    logger.debug(`Loaded robots.txt from ${robotsUrl}`);
    return parseRobotsTxt(text, options.userAgent);
  } catch (error) {
    // A missing robots.txt (4xx) allows everything; a failing server does not.
    if (error instanceof PermanentFetchError) {
      logger.debug(`No robots.txt at ${robotsUrl}: ${describeError(error)}`);
      return buildAllowAllPolicy();
    }
    logger.warn(
      `robots.txt at ${robotsUrl} unavailable (${describeError(error)}); treating ${baseUrl.host} as disallowed`
    );
    return buildDisallowAllPolicy();
  }
}

/**
 * One robots.txt fetch per origin per process.
 */
export class RobotsCache {
  private readonly options: RobotsOptions;
  private readonly policies = new Map<string, Promise<RobotsPolicy>>();

  constructor(options: RobotsOptions) {
    this.options = options;
  }

  policyFor(target: URL): Promise<RobotsPolicy> {
    const cached = this.policies.get(target.origin);
    if (cached) {
      return cached;
    }
    const loading = loadRobotsPolicy(target, this.options);
    this.policies.set(target.origin, loading);
    return loading;
  }

  async isAllowed(target: URL): Promise<boolean> {
    const policy = await this.policyFor(target);
    return policy.isAllowed(`${target.pathname}${target.search}`);
  }

  async crawlDelayMs(target: URL): Promise<number | undefined> {
    const policy = await this.policyFor(target);
    return policy.crawlDelayMs;
  }
}
