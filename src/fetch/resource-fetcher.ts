/**
 * Plain HTTP access for non-navigable resources and robots.txt
 */
import { bodyBytes, httpRequest, type RequestOptions } from './http-client.js';
import type { RobotsFetch } from '../crawl/robots-gate.js';
import type { FetchedResource, ResourceFetcher } from '../crawl/types.js';

export class HttpResourceFetcher implements ResourceFetcher {
  constructor(private readonly requestOptions: RequestOptions = {}) {}

  async fetch(url: string, options: { body?: boolean } = {}): Promise<FetchedResource> {
    const response = await httpRequest(url, this.requestOptions);
    if (response.statusCode === 0) {
      throw new Error(response.error ?? `No response from ${url}`);
    }
    return {
      statusCode: response.statusCode,
      body: options.body && response.success ? bodyBytes(response) : undefined,
    };
  }
}

/** robots.txt loader for RobotsGate; a failed request yields null. */
export function createRobotsFetch(requestOptions: RequestOptions = {}): RobotsFetch {
  return async (url) => {
    const response = await httpRequest(url, requestOptions);
    if (response.statusCode === 0) return null;
    return { ok: response.success, text: response.body ?? '' };
  };
}
