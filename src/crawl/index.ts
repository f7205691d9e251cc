/**
 * Crawl module barrel exports
 */
export { crawl, crawlAll, DEFAULT_CONCURRENCY, DEFAULT_USER_AGENT } from './crawler.js';
export type { CrawlContext } from './crawler.js';
export { normalizeLink, normalizeLinks, resolveBaseUrl } from './link-normalizer.js';
export { extractPageLinks } from './link-extractor.js';
export { compileScope, isInScope, isExcluded, isSameSite, withinDepth } from './scope.js';
export { VisitedLedger } from './visited-ledger.js';
export { RobotsGate, fetchRobotsTxt } from './robots-gate.js';
export type { RobotsFetch } from './robots-gate.js';
export { parseRobotsTxt, isAllowedByRobots } from './robots-parser.js';
export { StatusReporter, DEFAULT_PRINT_STATUS } from './status-reporter.js';
export { UNREACHABLE } from './types.js';
export type {
  CrawlEvent,
  CrawlOptions,
  CrawlSummary,
  CrawlTarget,
  FetchedResource,
  PageRenderer,
  RenderResult,
  ResourceFetcher,
  ScopeConfig,
  Sink,
  SkippedEvent,
  VisitOutcome,
  VisitedResource,
} from './types.js';
