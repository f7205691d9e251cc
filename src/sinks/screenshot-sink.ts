/**
 * Writes the renderer's screenshot of each visited page to disk
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { logger } from '../logger.js';
import type { Sink, VisitedResource } from '../crawl/types.js';

/** `https://example.com/docs/?page=2` → `example.com_docs_page_2.png` */
export function screenshotFileName(url: string): string {
  const slug = url
    .replace(/^[a-z][a-z\d+.-]*:\/\//i, '')
    .replace(/[^a-z0-9._-]+/gi, '_')
    .replace(/^_+|_+$/g, '');
  return `${slug || 'index'}.png`;
}

export class ScreenshotSink implements Sink {
  readonly name = 'screenshot';
  readonly kinds = ['page'] as const;

  constructor(private readonly dir: string) {}

  async handle({ target, screenshot }: VisitedResource): Promise<void> {
    if (!screenshot) return;

    const path = join(this.dir, screenshotFileName(target.url));
    await mkdir(this.dir, { recursive: true });
    await writeFile(path, screenshot);
    logger.debug({ url: target.url, path }, 'Saved screenshot');
  }
}
