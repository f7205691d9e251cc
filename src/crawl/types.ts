/**
 * Types for the crawl module
 */

/** Status reported in place of an HTTP code when a target could not be reached at all. */
export const UNREACHABLE = 'ERR';
export type Unreachable = typeof UNREACHABLE;

export type TargetKind = 'page' | 'image';

export interface CrawlTarget {
  readonly url: string;
  readonly depth: number;
  /** Seed URL this target was discovered from. */
  readonly seed: string;
  readonly kind: TargetKind;
}

export interface ScopeOptions {
  include?: string;
  exclude?: string;
  /** Recursion bound; undefined means unbounded. */
  depth?: number;
}

export interface ScopeConfig {
  readonly seed: string;
  /** scheme://authority of the seed */
  readonly baseUrl: string;
  readonly include?: RegExp;
  readonly exclude?: RegExp;
  readonly maxDepth?: number;
}

export interface RenderResult {
  statusCode: number;
  /** Raw href values in document order; normalized by the engine. */
  links: string[];
  /** Raw img src values in document order. */
  images: string[];
  /** URL the raw links resolve against, after redirects and <base href>. Defaults to the requested URL. */
  baseUrl?: string;
  body: string;
  screenshot?: Buffer;
}

export interface PageRenderer {
  /** Rejects on network or render failure. */
  render(url: string): Promise<RenderResult>;
  close(): Promise<void>;
}

export interface FetchedResource {
  statusCode: number;
  body?: Buffer;
}

export interface ResourceFetcher {
  /** Rejects on network failure. Pass `body: true` to keep the response bytes. */
  fetch(url: string, options?: { body?: boolean }): Promise<FetchedResource>;
}

export interface RobotsPolicy {
  allowed(url: string): Promise<boolean>;
}

/** What a sink sees of a reachable target. */
export interface VisitedResource {
  target: CrawlTarget;
  statusCode: number;
  body: string;
  screenshot?: Buffer;
  bytes?: Buffer;
}

/**
 * Side effect run once per reachable target of the kinds it handles.
 * May return lines of output (e.g. a command's stdout); never influences traversal.
 */
export interface Sink {
  readonly name: string;
  readonly kinds: readonly TargetKind[];
  /** Set when the sink needs the response bytes of image targets. */
  readonly needsBytes?: boolean;
  handle(resource: VisitedResource): Promise<string | void>;
}

export interface CrawlOptions extends ScopeOptions {
  /** Max renders/fetches in flight. */
  concurrency?: number;
  ignoreRobots?: boolean;
  /** Submit <img src> resources as image targets. */
  checkImages?: boolean;
  userAgent?: string;
  signal?: AbortSignal;
}

export interface VisitOutcome {
  type: 'visit';
  kind: TargetKind;
  url: string;
  depth: number;
  status: number | Unreachable;
  inScope: boolean;
  /** Normalized child links; only populated for reachable, in-scope pages under the depth bound. */
  links: string[];
  error?: string;
  /** Output produced by sinks, in sink order. */
  output: string[];
}

export interface SkippedEvent {
  type: 'skipped';
  kind: TargetKind;
  url: string;
  depth: number;
  reason: 'robots';
}

export interface CrawlSummary {
  type: 'summary';
  seed: string;
  pagesTotal: number;
  pagesSuccess: number;
  pagesFailed: number;
  pagesBlocked: number;
  imagesChecked: number;
  imagesBlocked: number;
  durationMs: number;
  aborted: boolean;
}

export type CrawlEvent = VisitOutcome | SkippedEvent | CrawlSummary;
