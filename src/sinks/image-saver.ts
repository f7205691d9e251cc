/**
 * Saves fetched images under <dir>/<host>/<path>
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { logger } from '../logger.js';
import type { Sink, VisitedResource } from '../crawl/types.js';

/** `logo.png` + `?w=64` -> `logo_w_64.png`; the extension stays last. */
function withQuery(name: string, search: string): string {
  const query = search.slice(1).replace(/[^a-z0-9.-]+/gi, '_').replace(/^_+|_+$/g, '');
  if (!query) return name;
  const dot = name.lastIndexOf('.');
  return dot > 0 ? `${name.slice(0, dot)}_${query}${name.slice(dot)}` : `${name}_${query}`;
}

/**
 * Relative file path for an image URL. Directory URLs get an `index` file name;
 * a query string is folded into the file name; the port separator becomes `_`.
 * Returns null for URLs without a host.
 */
export function imageFilePath(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (!parsed.host) return null;

  const segments = parsed.pathname.split('/').filter((s) => s && s !== '.' && s !== '..');
  if (parsed.pathname.endsWith('/') || segments.length === 0) segments.push('index');
  const last = segments.length - 1;
  segments[last] = withQuery(segments[last], parsed.search);

  return join(parsed.host.replace(/:/g, '_'), ...segments);
}

export class ImageSaver implements Sink {
  readonly name = 'save-images';
  readonly kinds = ['image'] as const;
  readonly needsBytes = true;

  constructor(private readonly dir: string) {}

  async handle({ target, statusCode, bytes }: VisitedResource): Promise<void> {
    if (!bytes || statusCode >= 400) return;

    const relative = imageFilePath(target.url);
    if (!relative) return;

    const path = join(this.dir, relative);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, bytes);
    logger.debug({ url: target.url, path, bytes: bytes.length }, 'Saved image');
  }
}
