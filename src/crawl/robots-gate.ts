/**
 * Per-origin robots.txt policy with a lazily filled cache
 */
import { logger } from '../logger.js';
import { isAllowedByRobots, parseRobotsTxt, type RobotsRules } from './robots-parser.js';
import type { RobotsPolicy } from './types.js';

export type RobotsFetch = (url: string) => Promise<{ ok: boolean; text: string } | null>;

export interface RobotsGateOptions {
  userAgent: string;
  /** Bypass robots.txt entirely. */
  ignore?: boolean;
}

/**
 * Fetch and parse robots.txt for an origin.
 * Returns null when it is missing, empty or cannot be fetched; callers treat that as allow-all.
 */
export async function fetchRobotsTxt(
  origin: string,
  fetchFn: RobotsFetch
): Promise<RobotsRules | null> {
  try {
    const response = await fetchFn(`${origin}/robots.txt`);
    if (!response?.ok || !response.text) return null;

    const rules = parseRobotsTxt(response.text);
    logger.debug({ origin, groups: rules.groups.length }, 'Parsed robots.txt');
    return rules;
  } catch (e) {
    logger.debug({ origin, error: String(e) }, 'Failed to fetch robots.txt');
    return null;
  }
}

export class RobotsGate implements RobotsPolicy {
  /** Promises, not results, so concurrent lookups for one origin share a single fetch. */
  private readonly cache = new Map<string, Promise<RobotsRules | null>>();

  constructor(
    private readonly fetchFn: RobotsFetch,
    private readonly options: RobotsGateOptions
  ) {}

  async allowed(url: string): Promise<boolean> {
    if (this.options.ignore) return true;

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }
    // Only HTTP(S) resources have a robots.txt.
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return true;

    let rules = this.cache.get(parsed.origin);
    if (!rules) {
      rules = fetchRobotsTxt(parsed.origin, this.fetchFn);
      this.cache.set(parsed.origin, rules);
    }

    const resolved = await rules;
    if (!resolved) return true;
    return isAllowedByRobots(parsed.pathname + parsed.search, resolved, this.options.userAgent);
  }

  /** Number of origins looked up so far. */
  get originCount(): number {
    return this.cache.size;
  }
}
