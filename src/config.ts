/**
 * Crawl configuration: validation of raw CLI values and derived request settings
 */
import { z } from 'zod';
import { DEFAULT_VIEWPORT } from './render/browser-renderer.js';
import { DEFAULT_PRINT_STATUS } from './crawl/status-reporter.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './fetch/http-client.js';

export const MAX_CONCURRENCY = 50;

/** Flag values as they come off the command line, before validation. */
export interface RawCrawlArgs {
  seeds: string[];
  depth?: string;
  include?: string;
  exclude?: string;
  checkImages?: boolean;
  saveImages?: string;
  screenshot?: string;
  width?: string;
  height?: string;
  execute?: string;
  printStatus?: string;
  wait?: string;
  httpBasic?: string;
  ignoreRobots?: boolean;
  concurrency?: string;
  timeout?: string;
  renderer?: string;
  proxy?: string;
  json?: boolean;
}

function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

const regexFlag = (flag: string) =>
  z.string().refine(isValidRegex, (value) => ({
    message: `${flag} is not a valid regular expression: ${value}`,
  }));

/** Decimal integer string in [min, max]. */
const intFlag = (flag: string, min: 0 | 1, max?: number) => {
  const message =
    min === 0 ? `${flag} must be a non-negative integer` : `${flag} must be a positive integer`;
  const bounded = z.number().min(min, message);
  return z
    .string()
    .regex(/^\d+$/, message)
    .transform(Number)
    .pipe(max === undefined ? bounded : bounded.max(max, `${flag} must not exceed ${max}`));
};

export const CrawlConfigSchema = z.object({
  seeds: z
    .array(
      z.string().refine(isHttpUrl, (value) => ({
        message: `Seed URL must start with http:// or https://: ${value}`,
      }))
    )
    .min(1, 'Missing required <url> argument'),
  depth: intFlag('--depth', 0).optional(),
  include: regexFlag('--include').optional(),
  exclude: regexFlag('--exclude').optional(),
  checkImages: z.boolean().default(false),
  saveImages: z.string().min(1, '--save-images requires a directory').optional(),
  screenshot: z.string().min(1, '--screenshot requires a directory').optional(),
  width: intFlag('--width', 1).default(String(DEFAULT_VIEWPORT.width)),
  height: intFlag('--height', 1).default(String(DEFAULT_VIEWPORT.height)),
  execute: z.string().min(1, '--execute requires a command').optional(),
  printStatus: regexFlag('--print-status').default(DEFAULT_PRINT_STATUS),
  wait: z
    .string()
    .regex(/^\d+(\.\d+)?$/, '--wait must be a non-negative number of seconds')
    .transform(Number)
    .default('0'),
  httpBasic: z
    .string()
    .regex(/^[^:]+:/, '--http-basic must be in the form user:pass')
    .optional(),
  ignoreRobots: z.boolean().default(false),
  concurrency: intFlag('--concurrency', 1, MAX_CONCURRENCY).default('1'),
  timeout: intFlag('--timeout', 1).default(String(DEFAULT_REQUEST_TIMEOUT_MS)),
  renderer: z
    .enum(['browser', 'http'], {
      errorMap: () => ({ message: '--renderer must be one of: browser, http' }),
    })
    .default('browser'),
  proxy: z.string().optional(),
  json: z.boolean().default(false),
});

export type CrawlConfig = z.output<typeof CrawlConfigSchema>;

export type ConfigResult = { ok: true; config: CrawlConfig } | { ok: false; message: string };

/** Validate raw flag values. All problems are reported in one message. */
export function validateConfig(raw: RawCrawlArgs): ConfigResult {
  const result = CrawlConfigSchema.safeParse(raw);
  if (!result.success) {
    return { ok: false, message: result.error.issues.map((issue) => issue.message).join('; ') };
  }

  const config = result.data;
  // Saving images means fetching them.
  if (config.saveImages !== undefined) config.checkImages = true;
  return { ok: true, config };
}

/** `Authorization` header value for `user:pass` credentials. */
export function basicAuthHeader(credentials: string): string {
  return `Basic ${Buffer.from(credentials, 'utf-8').toString('base64')}`;
}

/** Headers sent with every page, image and robots.txt request. */
export function requestHeaders(config: Pick<CrawlConfig, 'httpBasic'>): Record<string, string> {
  return config.httpBasic ? { Authorization: basicAuthHeader(config.httpBasic) } : {};
}
