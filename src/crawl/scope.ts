/**
 * Scope classification: which discovered URLs get recursed into
 */
import type { ScopeConfig, ScopeOptions } from './types.js';

/**
 * Compile a pattern so it matches from the first character of the URL.
 * The match need not consume the whole string.
 */
export function compilePattern(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})`);
}

/** scheme://authority of a URL, e.g. `https://example.com:8080`. */
export function baseUrlOf(url: string): string {
  const parsed = new URL(url);
  return `${parsed.protocol}//${parsed.host}`;
}

function stripWww(url: string): string {
  return url.replace(/^([a-z][a-z\d+.-]*:\/\/)www\./i, '$1');
}

/** Throws on an invalid seed URL or pattern. */
export function compileScope(seed: string, options: ScopeOptions = {}): ScopeConfig {
  return Object.freeze({
    seed,
    baseUrl: baseUrlOf(seed),
    include: options.include !== undefined ? compilePattern(options.include) : undefined,
    exclude: options.exclude !== undefined ? compilePattern(options.exclude) : undefined,
    maxDepth: options.depth,
  });
}

export function isExcluded(url: string, scope: ScopeConfig): boolean {
  return scope.exclude?.test(url) ?? false;
}

/** URL starts with the base URL (ignoring a www. host prefix) and the prefix ends at a boundary. */
export function isSameSite(url: string, baseUrl: string): boolean {
  const candidate = stripWww(url).toLowerCase();
  const base = stripWww(baseUrl).toLowerCase();
  if (!candidate.startsWith(base)) return false;

  const next = candidate.charAt(base.length);
  return next === '' || next === '/' || next === '?' || next === '#';
}

/**
 * Whether a URL is eligible for extraction and recursion.
 * An include pattern replaces the same-site default; exclude always wins.
 */
export function isInScope(url: string, scope: ScopeConfig): boolean {
  if (isExcluded(url, scope)) return false;
  if (scope.include) return scope.include.test(url);
  return isSameSite(url, scope.baseUrl);
}

/** Whether children of a target at `depth` may be extracted. */
export function withinDepth(depth: number, scope: ScopeConfig): boolean {
  return scope.maxDepth === undefined || depth < scope.maxDepth;
}
