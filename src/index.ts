/**
 * linkprobe - recursive crawler and link checker with robots.txt gating,
 * regex scoping and pluggable page renderers.
 *
 * @module linkprobe
 */
export * from './crawl/index.js';
export { HttpRenderer } from './render/http-renderer.js';
export { BrowserRenderer } from './render/browser-renderer.js';
export type { BrowserRendererOptions } from './render/browser-renderer.js';
export { HttpResourceFetcher, createRobotsFetch } from './fetch/resource-fetcher.js';
export { httpRequest, closeAllSessions } from './fetch/http-client.js';
export type { HttpResponse, RequestOptions } from './fetch/http-client.js';
export { ScreenshotSink } from './sinks/screenshot-sink.js';
export { ImageSaver } from './sinks/image-saver.js';
export { CommandSink } from './sinks/command-sink.js';
export { CrawlConfigSchema, validateConfig, basicAuthHeader } from './config.js';
export type { CrawlConfig, RawCrawlArgs } from './config.js';
