/**
 * Pull raw link and image references out of HTML
 */
import { parseHTML } from 'linkedom';

export interface PageLinks {
  links: string[];
  images: string[];
  /** The document's <base href>, as written */
  base?: string;
}

/**
 * Collect <a href> and <img src> attribute values in document order.
 * Values are returned as written; resolution happens in normalizeLink.
 */
export function extractPageLinks(html: string): PageLinks {
  const { document } = parseHTML(html);
  const links: string[] = [];
  const images: string[] = [];

  for (const anchor of document.querySelectorAll('a[href]')) {
    const href = anchor.getAttribute('href');
    if (href) links.push(href);
  }

  for (const img of document.querySelectorAll('img[src]')) {
    const src = img.getAttribute('src');
    if (src) images.push(src);
  }

  const base = document.querySelector('base[href]')?.getAttribute('href');
  return base ? { links, images, base } : { links, images };
}
