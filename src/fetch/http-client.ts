/**
 * Shared httpcloak client used for pages, images and robots.txt.
 * Sessions are cached per (preset, timeout, proxy) and reused across requests.
 */
import httpcloak from 'httpcloak';
import { logger } from '../logger.js';

/** Session metadata for lifecycle management */
export interface SessionMetadata {
  session: httpcloak.Session;
  created: number;
  requestCount: number;
  inFlightRequests: number;
}

const sessionCache = new Map<string, SessionMetadata>();

const SESSION_MAX_AGE_MS = 60 * 60 * 1000; // 1 hour
const SESSION_MAX_REQUESTS = 10000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 20000;
const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB

const DEFAULT_PRESET = httpcloak.Preset.CHROME_143;

export interface RequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  proxy?: string;
  preset?: string;
}

export interface HttpResponse {
  success: boolean;
  /** 0 when no response was received */
  statusCode: number;
  body?: string;
  headers: Record<string, string>;
  /** Final URL after redirects, when the client reports one */
  url?: string;
  error?: string;
}

/**
 * Redact credentials from a proxy URL for safe logging.
 */
export function redactProxyUrl(proxy: string): string {
  try {
    const url = new URL(proxy);
    if (url.password) url.password = '***';
    if (url.username) url.username = '***';
    return url.toString();
  } catch {
    return '<invalid-proxy-url>';
  }
}

/**
 * Resolve proxy URL from explicit option or environment variables.
 * Priority: explicit > LINKPROBE_PROXY > HTTPS_PROXY > HTTP_PROXY
 */
export function resolveProxy(explicit?: string): string | undefined {
  return (
    explicit || process.env.LINKPROBE_PROXY || process.env.HTTPS_PROXY || process.env.HTTP_PROXY
  );
}

function closeQuietly(key: string, session: httpcloak.Session): void {
  try {
    session.close();
  } catch (error) {
    logger.warn({ key: redactCacheKey(key), error: String(error) }, 'Error closing session');
  }
}

/** Cache keys have the format "preset|timeout|proxy_url" or "preset|timeout|direct". */
function redactCacheKey(key: string): string {
  const sep = key.indexOf('|', key.indexOf('|') + 1);
  if (sep === -1) return key;
  const proxy = key.substring(sep + 1);
  return proxy === 'direct' ? key : `${key.substring(0, sep)}|${redactProxyUrl(proxy)}`;
}

/** httpcloak's session timeout is in whole seconds. */
function sessionTimeoutSec(timeoutMs: number): number {
  return Math.max(1, Math.ceil(timeoutMs / 1000));
}

function finalUrl(response: object): string | undefined {
  return 'url' in response && typeof response.url === 'string' && response.url
    ? response.url
    : undefined;
}

/**
 * Get or create the session for a preset, request timeout and optional proxy.
 * Sessions are recycled after an hour or 10,000 requests once nothing is in flight on them.
 * Session creation is synchronous, so concurrent callers cannot race to create two.
 */
export function getSession(
  preset?: string,
  proxy?: string,
  timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS
): SessionMetadata {
  const presetValue = preset ?? DEFAULT_PRESET;
  const timeoutSec = sessionTimeoutSec(timeoutMs);
  const cacheKey = `${presetValue}|${timeoutSec}|${proxy || 'direct'}`;

  const metadata = sessionCache.get(cacheKey);
  if (metadata) {
    const expired =
      Date.now() - metadata.created > SESSION_MAX_AGE_MS ||
      metadata.requestCount >= SESSION_MAX_REQUESTS;

    if (!expired || metadata.inFlightRequests > 0) {
      metadata.requestCount++;
      return metadata;
    }

    logger.info({ key: redactCacheKey(cacheKey) }, 'Recycling aged httpcloak session');
    closeQuietly(cacheKey, metadata.session);
    sessionCache.delete(cacheKey);
  }

  logger.debug(
    { preset: presetValue, timeoutSec, proxy: proxy ? redactProxyUrl(proxy) : undefined },
    'Creating httpcloak session'
  );

  const created: SessionMetadata = {
    session: new httpcloak.Session({
      preset: presetValue,
      timeout: timeoutSec,
      ...(proxy ? { proxy } : {}),
    }),
    created: Date.now(),
    requestCount: 1,
    inFlightRequests: 0,
  };
  sessionCache.set(cacheKey, created);
  return created;
}

/**
 * Close all httpcloak sessions.
 * Call this before the process exits.
 */
export async function closeAllSessions(): Promise<void> {
  const entries = Array.from(sessionCache.entries());
  sessionCache.clear();
  for (const [key, metadata] of entries) {
    closeQuietly(key, metadata.session);
  }
}

/** Create a timeout promise that rejects after the specified timeout. */
function createRequestTimeout(
  url: string,
  timeoutMs: number
): { promise: Promise<never>; cancel: () => void } {
  let timeoutId: NodeJS.Timeout | undefined;
  const promise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new Error(`Request timeout after ${timeoutMs}ms for ${url}`)),
      timeoutMs
    );
  });
  return { promise, cancel: () => clearTimeout(timeoutId) };
}

/**
 * GET a URL. Never throws: failures come back with `success: false`,
 * `statusCode: 0` and an `error` message.
 */
export async function httpRequest(
  url: string,
  options: RequestOptions = {}
): Promise<HttpResponse> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  let metadata: SessionMetadata | undefined;
  const timeout = createRequestTimeout(url, timeoutMs);

  try {
    metadata = getSession(options.preset, options.proxy, timeoutMs);
    metadata.inFlightRequests++;

    // Cache-Control: no-cache keeps CDNs from answering 304 with an empty body.
    const headers: Record<string, string> = {
      'Cache-Control': 'no-cache',
      ...options.headers,
    };

    logger.debug(
      { url, proxy: options.proxy ? redactProxyUrl(options.proxy) : undefined },
      'Making httpcloak request'
    );

    const response = await Promise.race([metadata.session.get(url, { headers }), timeout.promise]);

    const contentLength = parseInt(response.headers?.['content-length'] ?? '', 10);
    if (!isNaN(contentLength) && contentLength > MAX_RESPONSE_SIZE) {
      logger.warn(
        { url, contentLength, limit: MAX_RESPONSE_SIZE },
        'Content-Length exceeds size limit'
      );
      return {
        success: false,
        statusCode: response.statusCode,
        headers: {},
        error: 'response_too_large',
      };
    }

    // httpcloak exposes text either as a property or as a method depending on the release
    const textValue = response.text as string | (() => string);
    const body = typeof textValue === 'function' ? textValue() : textValue;

    if (body && body.length > MAX_RESPONSE_SIZE) {
      logger.warn(
        { url, size: body.length, limit: MAX_RESPONSE_SIZE },
        'Response exceeds size limit'
      );
      return {
        success: false,
        statusCode: response.statusCode,
        headers: {},
        error: 'response_too_large',
      };
    }

    logger.debug(
      { url, statusCode: response.statusCode, bodyLength: body?.length ?? 0 },
      'GET complete'
    );

    const redirectedTo = finalUrl(response);
    return {
      success: response.ok,
      statusCode: response.statusCode,
      body,
      headers: response.headers ?? {},
      ...(redirectedTo ? { url: redirectedTo } : {}),
    };
  } catch (error) {
    logger.debug({ url, error: String(error) }, 'httpcloak request failed');
    return {
      success: false,
      statusCode: 0,
      headers: {},
      error: String(error),
    };
  } finally {
    timeout.cancel();
    if (metadata) metadata.inFlightRequests--;
  }
}

/**
 * Response body as bytes. httpcloak hands bodies back as strings; latin1 maps
 * each char code 0-255 back to the byte it came from.
 */
export function bodyBytes(response: HttpResponse): Buffer {
  return Buffer.from(response.body ?? '', 'latin1');
}
