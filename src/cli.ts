#!/usr/bin/env node
/**
 * CLI entry point for linkprobe
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { closeAllSessions, resolveProxy, type RequestOptions } from './fetch/http-client.js';
import { HttpResourceFetcher, createRobotsFetch } from './fetch/resource-fetcher.js';
import { HttpRenderer } from './render/http-renderer.js';
import { BrowserRenderer } from './render/browser-renderer.js';
import { ScreenshotSink } from './sinks/screenshot-sink.js';
import { ImageSaver } from './sinks/image-saver.js';
import { CommandSink } from './sinks/command-sink.js';
import { crawlAll, type CrawlContext } from './crawl/crawler.js';
import { StatusReporter } from './crawl/status-reporter.js';
import { VisitedLedger } from './crawl/visited-ledger.js';
import type { CrawlEvent, CrawlOptions, Sink } from './crawl/types.js';
import {
  MAX_CONCURRENCY,
  requestHeaders,
  validateConfig,
  type CrawlConfig,
  type RawCrawlArgs,
} from './config.js';
import { logger } from './logger.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? 'unknown';
  } catch (error) {
    logger.debug({ error: String(error) }, 'Failed to read version from package.json');
    return 'unknown';
  }
}

type ValueFlag = Exclude<keyof RawCrawlArgs, 'seeds' | 'checkImages' | 'ignoreRobots' | 'json'>;

const VALUE_FLAGS = new Map<string, ValueFlag>([
  ['--depth', 'depth'],
  ['--include', 'include'],
  ['--exclude', 'exclude'],
  ['--save-images', 'saveImages'],
  ['--screenshot', 'screenshot'],
  ['--width', 'width'],
  ['--height', 'height'],
  ['--execute', 'execute'],
  ['--print-status', 'printStatus'],
  ['--wait', 'wait'],
  ['--http-basic', 'httpBasic'],
  ['--concurrency', 'concurrency'],
  ['--timeout', 'timeout'],
  ['--renderer', 'renderer'],
  ['--proxy', 'proxy'],
]);

type ParseResult =
  | { kind: 'ok'; config: CrawlConfig; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

/**
 * Parse command-line arguments. Value flags take either `--flag=value` or `--flag value`.
 */
export function parseArgs(args: string[]): ParseResult {
  const raw: RawCrawlArgs = { seeds: [] };
  const warnings: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eqIdx = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const name = eqIdx === -1 ? arg : arg.slice(0, eqIdx);
    const inline = eqIdx === -1 ? undefined : arg.slice(eqIdx + 1);

    const valueFlag = VALUE_FLAGS.get(name);
    if (valueFlag) {
      if (inline !== undefined) {
        raw[valueFlag] = inline;
      } else if (i + 1 < args.length) {
        raw[valueFlag] = args[++i];
      } else {
        return { kind: 'error', message: `${name} requires a value` };
      }
      continue;
    }

    switch (name) {
      case '--check-images':
        raw.checkImages = true;
        break;
      case '--ignore-robots':
        raw.ignoreRobots = true;
        break;
      case '--json':
        raw.json = true;
        break;
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          raw.seeds.push(arg);
        }
    }
  }

  const result = validateConfig(raw);
  if (!result.ok) return { kind: 'error', message: result.message };

  if (result.config.screenshot !== undefined && result.config.renderer === 'http') {
    warnings.push('--screenshot needs --renderer browser; no screenshots will be taken');
  }
  if (result.config.wait > 0 && result.config.renderer === 'http') {
    warnings.push('--wait has no effect with --renderer http');
  }

  return { kind: 'ok', config: result.config, warnings };
}

function printUsage(): void {
  console.log(`Usage: linkprobe <url...> [options]

Crawls each seed URL, recursing into links on the same site and checking the
status of everything else. Prints "<status>\\t<url>" per visited URL; ERR marks
a URL that could not be reached.

Options:
  --depth <n>           Max link-following depth (default: unbounded)
  --include <regex>     Recurse into URLs matching this pattern instead of the seed's site
  --exclude <regex>     Skip URLs matching this pattern entirely
  --check-images        Check the status of <img src> resources
  --save-images <dir>   Download images into <dir> (implies --check-images)
  --screenshot <dir>    Save a PNG of every visited page into <dir>
  --width <px>          Screenshot viewport width (default: 1280)
  --height <px>         Screenshot viewport height (default: 800)
  --execute <command>   Pipe each page's rendered HTML into a shell command; print its output
  --print-status <re>   Only print statuses matching this pattern (default: .*)
  --wait <seconds>      Wait after load before reading links (default: 0)
  --http-basic <u:p>    Send HTTP basic auth with every request
  --ignore-robots       Do not consult robots.txt
  --concurrency <n>     Pages in flight at once (default: 1, max: ${MAX_CONCURRENCY})
  --timeout <ms>        Per-request timeout in milliseconds (default: 20000)
  --renderer <name>     browser (headless Chromium, default) or http (static HTML)
  --proxy <url>         Proxy for HTTP requests (env: LINKPROBE_PROXY, HTTPS_PROXY, HTTP_PROXY)
  --json                Print every crawl event as a JSON line
  -v, --version         Show version number
  -h, --help            Show this help message

Environment:
  LOG_LEVEL               trace|debug|info|warn|error|fatal (default: info)
  LINKPROBE_BROWSER_PATH  Chromium executable for --renderer browser`);
}

interface Run {
  options: CrawlOptions;
  context: CrawlContext;
  renderer: HttpRenderer | BrowserRenderer;
}

/** Wire collaborators for a validated config. */
export function createRun(config: CrawlConfig, signal?: AbortSignal): Run {
  const headers = requestHeaders(config);
  const requestOptions: RequestOptions = {
    headers,
    timeoutMs: config.timeout,
    proxy: resolveProxy(config.proxy),
  };

  const renderer =
    config.renderer === 'http'
      ? new HttpRenderer(requestOptions)
      : new BrowserRenderer({
          headers,
          timeoutMs: config.timeout,
          waitMs: config.wait * 1000,
          screenshot: config.screenshot !== undefined,
          viewport: { width: config.width, height: config.height },
          executablePath: process.env.LINKPROBE_BROWSER_PATH,
        });

  const sinks: Sink[] = [];
  if (config.screenshot !== undefined) sinks.push(new ScreenshotSink(config.screenshot));
  if (config.execute !== undefined) sinks.push(new CommandSink(config.execute));
  if (config.saveImages !== undefined) sinks.push(new ImageSaver(config.saveImages));

  return {
    options: {
      depth: config.depth,
      include: config.include,
      exclude: config.exclude,
      concurrency: config.concurrency,
      ignoreRobots: config.ignoreRobots,
      checkImages: config.checkImages,
      signal,
    },
    context: {
      ledger: new VisitedLedger(),
      renderer,
      fetcher: new HttpResourceFetcher(requestOptions),
      robotsFetch: createRobotsFetch(requestOptions),
      sinks,
    },
    renderer,
  };
}

function writeEvent(event: CrawlEvent, config: CrawlConfig, reporter: StatusReporter): void {
  if (config.json) {
    console.log(JSON.stringify(event));
    return;
  }

  if (event.type === 'visit') {
    reporter.report(event);
    for (const output of event.output) {
      process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
    }
  } else if (event.type === 'summary') {
    const blocked = event.pagesBlocked > 0 ? `, ${event.pagesBlocked} blocked` : '';
    const images = event.imagesChecked > 0 ? `, ${event.imagesChecked} images` : '';
    const imagesBlocked =
      event.imagesBlocked > 0 ? `, ${event.imagesBlocked} images blocked` : '';
    const aborted = event.aborted ? ' (aborted)' : '';
    console.error(
      `Crawl of ${event.seed} complete: ${event.pagesSuccess}/${event.pagesTotal} pages ok${blocked}${images}${imagesBlocked}, ${event.durationMs}ms${aborted}`
    );
  }
}

export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  const result = parseArgs(args);

  switch (result.kind) {
    case 'version':
      console.log(`linkprobe ${getVersion()}`);
      return;
    case 'help':
      printUsage();
      return;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      process.exitCode = 1;
      return;
  }

  const { config, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  // First signal: stop scheduling and drain in-flight pages. A second one kills the process.
  const controller = new AbortController();
  const onSignal = (): void => {
    if (controller.signal.aborted) process.exit(130);
    logger.info('Stopping: finishing in-flight pages');
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const { options, context, renderer } = createRun(config, controller.signal);
  const reporter = new StatusReporter(config.printStatus);

  try {
    if (renderer instanceof BrowserRenderer) await renderer.launch();

    for await (const event of crawlAll(config.seeds, options, context)) {
      writeEvent(event, config, reporter);
    }
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await renderer.close();
    await closeAllSessions();
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then(() => {
      // httpcloak's native library keeps handles open; exit explicitly once the crawl is done.
      process.exit(process.exitCode ?? 0);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
