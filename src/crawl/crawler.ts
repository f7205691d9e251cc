/**
 * Traversal engine: an AsyncGenerator yielding one event per visited or skipped target, then a summary
 */
import { logger } from '../logger.js';
import { normalizeLink, normalizeLinks } from './link-normalizer.js';
import { RobotsGate, type RobotsFetch } from './robots-gate.js';
import { compileScope, isExcluded, isInScope, withinDepth } from './scope.js';
import {
  UNREACHABLE,
  type CrawlEvent,
  type CrawlOptions,
  type CrawlSummary,
  type CrawlTarget,
  type FetchedResource,
  type PageRenderer,
  type RenderResult,
  type ResourceFetcher,
  type RobotsPolicy,
  type ScopeConfig,
  type Sink,
  type TargetKind,
  type VisitOutcome,
  type VisitedResource,
} from './types.js';
import type { VisitedLedger } from './visited-ledger.js';

export const DEFAULT_CONCURRENCY = 1;
export const DEFAULT_USER_AGENT = 'linkprobe';

/** State of one run, shared by every seed crawled with it. */
export interface CrawlContext {
  ledger: VisitedLedger;
  renderer: PageRenderer;
  fetcher: ResourceFetcher;
  /** Used to build a fresh robots cache for each seed. */
  robotsFetch: RobotsFetch;
  sinks?: Sink[];
}

interface SeedRun {
  seed: string;
  scope: ScopeConfig;
  robots: RobotsPolicy;
  context: CrawlContext;
  checkImages: boolean;
  /** Pending targets; popped from the end so the first link on a page is visited first. */
  stack: CrawlTarget[];
}

/**
 * Claim a discovered URL and queue it.
 * Excluded URLs are dropped before the ledger sees them; they are never rendered or reported.
 */
function submit(run: SeedRun, url: string, depth: number, kind: TargetKind): boolean {
  if (kind === 'page' && run.scope.maxDepth !== undefined && depth > run.scope.maxDepth) {
    return false;
  }
  if (isExcluded(url, run.scope)) {
    logger.debug({ url }, 'Excluded');
    return false;
  }
  if (!run.context.ledger.shouldVisit(url)) return false;

  run.stack.push({ url, depth, seed: run.seed, kind });
  return true;
}

/** Run the sinks for one target. A failing sink is logged and skipped. */
async function runSinks(sinks: Sink[], resource: VisitedResource): Promise<string[]> {
  const output: string[] = [];
  for (const sink of sinks) {
    if (!sink.kinds.includes(resource.target.kind)) continue;
    try {
      const result = await sink.handle(resource);
      if (typeof result === 'string' && result.length > 0) output.push(result);
    } catch (e) {
      logger.warn({ sink: sink.name, url: resource.target.url, error: String(e) }, 'Sink failed');
    }
  }
  return output;
}

function unreachable(target: CrawlTarget, inScope: boolean, error: unknown): VisitOutcome {
  logger.debug({ url: target.url, error: String(error) }, 'Unreachable');
  return {
    type: 'visit',
    kind: target.kind,
    url: target.url,
    depth: target.depth,
    status: UNREACHABLE,
    inScope,
    links: [],
    error: String(error),
    output: [],
  };
}

async function visitPage(run: SeedRun, target: CrawlTarget): Promise<VisitOutcome> {
  const inScope = isInScope(target.url, run.scope);

  let page: RenderResult;
  try {
    page = await run.context.renderer.render(target.url);
  } catch (e) {
    return unreachable(target, inScope, e);
  }

  const baseUrl = page.baseUrl ?? target.url;
  const links =
    inScope && withinDepth(target.depth, run.scope) ? normalizeLinks(page.links, baseUrl) : [];
  for (let i = links.length - 1; i >= 0; i--) {
    submit(run, links[i], target.depth + 1, 'page');
  }

  if (run.checkImages) {
    const images = normalizeLinks(page.images, baseUrl);
    for (let i = images.length - 1; i >= 0; i--) {
      submit(run, images[i], target.depth, 'image');
    }
  }

  const output = await runSinks(run.context.sinks ?? [], {
    target,
    statusCode: page.statusCode,
    body: page.body,
    screenshot: page.screenshot,
  });

  return {
    type: 'visit',
    kind: 'page',
    url: target.url,
    depth: target.depth,
    status: page.statusCode,
    inScope,
    links,
    output,
  };
}

async function visitImage(run: SeedRun, target: CrawlTarget): Promise<VisitOutcome> {
  const inScope = isInScope(target.url, run.scope);
  const sinks = run.context.sinks ?? [];
  const wantBytes = sinks.some((s) => s.needsBytes === true && s.kinds.includes('image'));

  let resource: FetchedResource;
  try {
    resource = await run.context.fetcher.fetch(target.url, { body: wantBytes });
  } catch (e) {
    return unreachable(target, inScope, e);
  }

  const output = await runSinks(sinks, {
    target,
    statusCode: resource.statusCode,
    body: '',
    bytes: resource.body,
  });

  return {
    type: 'visit',
    kind: 'image',
    url: target.url,
    depth: target.depth,
    status: resource.statusCode,
    inScope,
    links: [],
    output,
  };
}

/** Gate, then render or fetch. Never rejects. */
async function visit(run: SeedRun, target: CrawlTarget): Promise<CrawlEvent> {
  try {
    if (!(await run.robots.allowed(target.url))) {
      logger.debug({ url: target.url }, 'Blocked by robots.txt');
      return {
        type: 'skipped',
        kind: target.kind,
        url: target.url,
        depth: target.depth,
        reason: 'robots',
      };
    }
    return target.kind === 'page' ? await visitPage(run, target) : await visitImage(run, target);
  } catch (e) {
    return unreachable(target, isInScope(target.url, run.scope), e);
  }
}

/**
 * Crawl from one seed. Yields a `visit` event per rendered or fetched target,
 * a `skipped` event per robots-blocked target, and a final `summary`.
 *
 * Pages are rendered with a sliding window of `concurrency` in-flight visits:
 * each completed visit frees its slot for the next pending target.
 */
export async function* crawl(
  seed: string,
  options: CrawlOptions,
  context: CrawlContext
): AsyncGenerator<CrawlEvent> {
  const startTime = Date.now();
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;

  const seedUrl = normalizeLink(seed, seed);
  if (seedUrl === null) throw new Error(`Invalid seed URL: ${seed}`);

  const run: SeedRun = {
    seed: seedUrl,
    scope: compileScope(seedUrl, options),
    robots: new RobotsGate(context.robotsFetch, {
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      ignore: options.ignoreRobots,
    }),
    context,
    checkImages: options.checkImages ?? false,
    stack: [],
  };

  const summary: CrawlSummary = {
    type: 'summary',
    seed: seedUrl,
    pagesTotal: 0,
    pagesSuccess: 0,
    pagesFailed: 0,
    pagesBlocked: 0,
    imagesChecked: 0,
    imagesBlocked: 0,
    durationMs: 0,
    aborted: false,
  };

  logger.info(
    { seed: seedUrl, maxDepth: run.scope.maxDepth ?? null, concurrency },
    'Crawling seed'
  );
  submit(run, seedUrl, 0, 'page');

  let nextId = 0;
  const inflight = new Map<number, Promise<{ id: number; event: CrawlEvent }>>();

  function schedule(): void {
    while (inflight.size < concurrency && !options.signal?.aborted) {
      const target = run.stack.pop();
      if (!target) break;
      const id = nextId++;
      inflight.set(id, visit(run, target).then((event) => ({ id, event })));
    }
  }

  schedule();

  while (inflight.size > 0) {
    const settled = await Promise.race(inflight.values());
    inflight.delete(settled.id);

    const { event } = settled;
    if (event.type === 'skipped') {
      if (event.kind === 'image') summary.imagesBlocked++;
      else summary.pagesBlocked++;
    } else if (event.type === 'visit' && event.kind === 'image') {
      summary.imagesChecked++;
    } else if (event.type === 'visit') {
      summary.pagesTotal++;
      if (typeof event.status === 'number' && event.status < 400) summary.pagesSuccess++;
      else summary.pagesFailed++;
    }
    yield event;

    schedule();
  }

  summary.aborted = options.signal?.aborted ?? false;
  summary.durationMs = Date.now() - startTime;
  if (summary.aborted) {
    logger.info({ seed: seedUrl, pending: run.stack.length }, 'Crawl aborted');
  }
  yield summary;
}

/**
 * Crawl several seeds in order. The visited ledger in `context` is shared by all
 * of them; scope and robots policies are rebuilt for each seed.
 */
export async function* crawlAll(
  seeds: readonly string[],
  options: CrawlOptions,
  context: CrawlContext
): AsyncGenerator<CrawlEvent> {
  for (const seed of seeds) {
    if (options.signal?.aborted) break;
    yield* crawl(seed, options, context);
  }
}
