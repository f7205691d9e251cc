/**
 * Static page renderer: one GET, links read from the served HTML. No script execution.
 */
import { httpRequest, type RequestOptions } from '../fetch/http-client.js';
import { extractPageLinks } from '../crawl/link-extractor.js';
import { resolveBaseUrl } from '../crawl/link-normalizer.js';
import type { PageRenderer, RenderResult } from '../crawl/types.js';

function isHtml(headers: Record<string, string>): boolean {
  const contentType = headers['content-type'];
  return contentType === undefined || /html/i.test(contentType);
}

export class HttpRenderer implements PageRenderer {
  constructor(private readonly requestOptions: RequestOptions = {}) {}

  async render(url: string): Promise<RenderResult> {
    const response = await httpRequest(url, this.requestOptions);
    if (response.statusCode === 0) {
      throw new Error(response.error ?? `No response from ${url}`);
    }

    const body = response.body ?? '';
    const { links, images, base } = isHtml(response.headers)
      ? extractPageLinks(body)
      : { links: [], images: [] };
    const baseUrl = resolveBaseUrl(response.url ?? url, base);

    return { statusCode: response.statusCode, links, images, baseUrl, body };
  }

  async close(): Promise<void> {
    // Sessions are shared with the resource fetcher; the CLI closes them once at exit.
  }
}
