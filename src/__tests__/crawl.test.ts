import { describe, it, expect, vi } from 'vitest';
import { normalizeLink, normalizeLinks, resolveBaseUrl } from '../crawl/link-normalizer.js';
import { extractPageLinks } from '../crawl/link-extractor.js';
import {
  baseUrlOf,
  compilePattern,
  compileScope,
  isExcluded,
  isInScope,
  isSameSite,
  withinDepth,
} from '../crawl/scope.js';
import { VisitedLedger } from '../crawl/visited-ledger.js';
import { parseRobotsTxt, isAllowedByRobots, rulesFor } from '../crawl/robots-parser.js';
import { StatusReporter } from '../crawl/status-reporter.js';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('link-normalizer', () => {
  describe('normalizeLink', () => {
    it('resolves a root-relative link against the page', () => {
      expect(normalizeLink('/about', 'http://example.com')).toBe('http://example.com/about');
    });

    it('returns an absolute link unchanged', () => {
      expect(normalizeLink('http://other.com/x', 'http://example.com')).toBe('http://other.com/x');
    });

    it('drops fragment-only links', () => {
      expect(normalizeLink('#section', 'http://example.com')).toBeNull();
    });

    it('drops script-invocation links', () => {
      expect(normalizeLink('javascript:void(0)', 'http://example.com/')).toBeNull();
      expect(normalizeLink('  JavaScript:alert(1)', 'http://example.com/')).toBeNull();
      expect(normalizeLink('vbscript:msgbox', 'http://example.com/')).toBeNull();
    });

    it('drops empty and whitespace-only links', () => {
      expect(normalizeLink('', 'http://example.com/')).toBeNull();
      expect(normalizeLink('   ', 'http://example.com/')).toBeNull();
    });

    it('resolves document-relative links against the page path', () => {
      expect(normalizeLink('b.html', 'http://site.test/dir/a.html')).toBe(
        'http://site.test/dir/b.html'
      );
      expect(normalizeLink('../up', 'http://site.test/dir/a.html')).toBe('http://site.test/up');
    });

    it('resolves query-only links against the page', () => {
      expect(normalizeLink('?q=1', 'http://site.test/a')).toBe('http://site.test/a?q=1');
    });

    it('resolves scheme-relative links with the page scheme', () => {
      expect(normalizeLink('//cdn.test/lib.js', 'https://site.test/page')).toBe(
        'https://cdn.test/lib.js'
      );
    });

    it('re-serializes links with an authority in canonical form', () => {
      expect(normalizeLink('HTTP://Example.COM/Path', 'http://site.test/')).toBe(
        'http://example.com/Path'
      );
      expect(normalizeLink('http://example.com', 'http://site.test/')).toBe('http://example.com/');
    });

    it('keeps non-hierarchical schemes such as mailto', () => {
      expect(normalizeLink('mailto:a@b.com', 'http://site.test/')).toBe('mailto:a@b.com');
    });

    it('keeps trailing slash and query variants distinct', () => {
      expect(normalizeLink('/a/', 'http://site.test/')).toBe('http://site.test/a/');
      expect(normalizeLink('/a', 'http://site.test/')).toBe('http://site.test/a');
    });

    it('drops malformed links instead of throwing', () => {
      expect(normalizeLink('http://', 'http://site.test/')).toBeNull();
      expect(normalizeLink('http://exa mple.com/', 'http://site.test/')).toBeNull();
    });
  });

  describe('normalizeLinks', () => {
    it('keeps order and drops links that yield no target', () => {
      expect(
        normalizeLinks(['#top', '/a', 'javascript:x()', '/b', 'http://'], 'http://site.test/')
      ).toEqual(['http://site.test/a', 'http://site.test/b']);
    });
  });

  describe('resolveBaseUrl', () => {
    it('uses the page URL without a <base href>', () => {
      expect(resolveBaseUrl('http://site.test/docs/')).toBe('http://site.test/docs/');
      expect(resolveBaseUrl('http://site.test/docs/', '  ')).toBe('http://site.test/docs/');
    });

    it('resolves a relative <base href> against the page URL', () => {
      expect(resolveBaseUrl('http://site.test/docs', '/docs/')).toBe('http://site.test/docs/');
      expect(resolveBaseUrl('http://site.test/a', 'http://cdn.test/')).toBe('http://cdn.test/');
    });

    it('ignores an unparsable <base href>', () => {
      expect(resolveBaseUrl('http://site.test/a', 'http://')).toBe('http://site.test/a');
    });
  });
});

describe('link-extractor', () => {
  it('returns raw hrefs and image sources in document order', () => {
    const html = `<html><body>
      <a href="/a">A</a>
      <img src="/logo.png">
      <a>no href</a>
      <a href="">empty</a>
      <a href="http://x.test/b">B</a>
      <img alt="no src">
      <a href="#top">Top</a>
    </body></html>`;

    expect(extractPageLinks(html)).toEqual({
      links: ['/a', 'http://x.test/b', '#top'],
      images: ['/logo.png'],
    });
  });

  it('reports the first <base href>', () => {
    const html = `<html><head><base href="/docs/"><base href="/other/"></head>
      <body><a href="intro">Intro</a></body></html>`;

    expect(extractPageLinks(html)).toEqual({ links: ['intro'], images: [], base: '/docs/' });
  });

  it('returns empty lists for a page without links', () => {
    expect(extractPageLinks('<html><body><p>text</p></body></html>')).toEqual({
      links: [],
      images: [],
    });
  });
});

describe('scope', () => {
  describe('baseUrlOf', () => {
    it('keeps scheme, host and port', () => {
      expect(baseUrlOf('https://site.test:8443/a/b?c=1')).toBe('https://site.test:8443');
      expect(baseUrlOf('http://site.test/')).toBe('http://site.test');
    });
  });

  describe('compilePattern', () => {
    it('matches from the start of the string only', () => {
      expect(compilePattern('docs').test('http://docs.test/')).toBe(false);
      expect(compilePattern('http://docs').test('http://docs.test/')).toBe(true);
    });

    it('anchors every alternative', () => {
      const re = compilePattern('a|http://site');
      expect(re.test('http://x.test/a')).toBe(false);
      expect(re.test('http://site.test/')).toBe(true);
    });
  });

  describe('isInScope (domain default)', () => {
    const scope = compileScope('http://site.test/');

    it('accepts URLs under the seed base URL', () => {
      expect(isInScope('http://site.test/a', scope)).toBe(true);
      expect(isInScope('http://site.test', scope)).toBe(true);
      expect(isInScope('http://site.test?x=1', scope)).toBe(true);
    });

    it('treats a www. prefix as the same site', () => {
      expect(isInScope('http://www.site.test/a', scope)).toBe(true);
      const wwwScope = compileScope('https://www.site.test/');
      expect(isInScope('https://site.test/x', wwwScope)).toBe(true);
    });

    it('rejects other hosts', () => {
      expect(isInScope('http://external.test/b', scope)).toBe(false);
    });

    it('rejects hosts that only share a prefix with the seed host', () => {
      expect(isInScope('http://site.test.evil.test/', scope)).toBe(false);
      expect(isInScope('http://site.test:8080/', scope)).toBe(false);
    });

    it('rejects a different scheme', () => {
      expect(isInScope('https://site.test/a', scope)).toBe(false);
    });

    it('is deterministic', () => {
      const first = isInScope('http://site.test/a', scope);
      const second = isInScope('http://site.test/a', scope);
      expect(first).toBe(second);
    });
  });

  describe('isInScope (include override)', () => {
    it('ignores the seed domain when an include pattern is set', () => {
      const scope = compileScope('http://site.test/', { include: 'http://docs\\.' });
      expect(isInScope('http://docs.test/x', scope)).toBe(true);
      expect(isInScope('http://site.test/a', scope)).toBe(false);
    });

    it('does not search for the pattern inside the URL', () => {
      const scope = compileScope('http://site.test/', { include: 'docs' });
      expect(isInScope('http://docs.test/', scope)).toBe(false);
    });

    it('accepts a full-URL pattern', () => {
      const scope = compileScope('http://site.test/', { include: 'https?://[^/]+/blog' });
      expect(isInScope('https://x.test/blog/post', scope)).toBe(true);
      expect(isInScope('https://x.test/shop', scope)).toBe(false);
    });
  });

  describe('exclude', () => {
    it('takes precedence over include', () => {
      const scope = compileScope('http://site.test/', {
        include: 'http://site',
        exclude: 'http://site\\.test/private',
      });
      expect(isInScope('http://site.test/private/x', scope)).toBe(false);
      expect(isExcluded('http://site.test/private/x', scope)).toBe(true);
      expect(isInScope('http://site.test/public', scope)).toBe(true);
    });

    it('takes precedence over the domain default', () => {
      const scope = compileScope('http://site.test/', { exclude: 'http://site\\.test/logout' });
      expect(isInScope('http://site.test/logout', scope)).toBe(false);
    });

    it('matches non-http links', () => {
      const scope = compileScope('http://site.test/', { exclude: '^mailto' });
      expect(isExcluded('mailto:a@b.com', scope)).toBe(true);
      expect(isExcluded('http://site.test/mailto', scope)).toBe(false);
    });

    it('excludes nothing when unset', () => {
      expect(isExcluded('http://site.test/a', compileScope('http://site.test/'))).toBe(false);
    });
  });

  describe('compileScope', () => {
    it('is frozen', () => {
      const scope = compileScope('http://site.test/', { depth: 2 });
      expect(Object.isFrozen(scope)).toBe(true);
      expect(scope.maxDepth).toBe(2);
      expect(scope.baseUrl).toBe('http://site.test');
    });

    it('throws on an invalid pattern', () => {
      expect(() => compileScope('http://site.test/', { include: '(' })).toThrow();
    });
  });

  describe('isSameSite', () => {
    it('compares host case-insensitively', () => {
      expect(isSameSite('HTTP://SITE.test/A', 'http://site.test')).toBe(true);
    });
  });

  describe('withinDepth', () => {
    it('allows extraction below the bound only', () => {
      const scope = compileScope('http://site.test/', { depth: 1 });
      expect(withinDepth(0, scope)).toBe(true);
      expect(withinDepth(1, scope)).toBe(false);
    });

    it('is unbounded without a depth', () => {
      expect(withinDepth(1000, compileScope('http://site.test/'))).toBe(true);
    });
  });
});

describe('VisitedLedger', () => {
  it('claims a URL exactly once', () => {
    const ledger = new VisitedLedger();
    expect(ledger.shouldVisit('http://site.test/a')).toBe(true);
    expect(ledger.shouldVisit('http://site.test/a')).toBe(false);
    expect(ledger.has('http://site.test/a')).toBe(true);
    expect(ledger.size).toBe(1);
  });

  it('compares by exact string', () => {
    const ledger = new VisitedLedger();
    expect(ledger.shouldVisit('http://site.test/a')).toBe(true);
    expect(ledger.shouldVisit('http://site.test/a/')).toBe(true);
    expect(ledger.shouldVisit('http://site.test/a?x=1')).toBe(true);
    expect(ledger.size).toBe(3);
  });
});

describe('robots-parser', () => {
  const content = `User-agent: *
Disallow: /private
Allow: /private/open

User-agent: linkprobe
User-agent: otherbot
Disallow: /nolinkprobe
`;

  describe('parseRobotsTxt', () => {
    it('groups consecutive user-agent lines', () => {
      expect(parseRobotsTxt(content).groups).toEqual([
        {
          agents: ['*'],
          rules: [
            { allow: false, pattern: '/private' },
            { allow: true, pattern: '/private/open' },
          ],
        },
        {
          agents: ['linkprobe', 'otherbot'],
          rules: [{ allow: false, pattern: '/nolinkprobe' }],
        },
      ]);
    });

    it('strips comments and handles CRLF', () => {
      const rules = parseRobotsTxt('User-agent: * # everyone\r\nDisallow: /tmp # temp\r\n');
      expect(rules.groups).toEqual([{ agents: ['*'], rules: [{ allow: false, pattern: '/tmp' }] }]);
    });

    it('ignores rules before the first user-agent line', () => {
      const rules = parseRobotsTxt('Disallow: /orphan\nUser-agent: *\nDisallow: /x\n');
      expect(rules.groups).toEqual([{ agents: ['*'], rules: [{ allow: false, pattern: '/x' }] }]);
    });

    it('treats an empty Disallow as no rule', () => {
      const rules = parseRobotsTxt('User-agent: *\nDisallow:\n');
      expect(rules.groups).toEqual([{ agents: ['*'], rules: [] }]);
    });

    it('handles empty content', () => {
      expect(parseRobotsTxt('').groups).toEqual([]);
    });
  });

  describe('rulesFor', () => {
    it('prefers a group naming the product token', () => {
      const rules = parseRobotsTxt(content);
      expect(rulesFor(rules, 'linkprobe/0.1 (+https://example.com)')).toEqual([
        { allow: false, pattern: '/nolinkprobe' },
      ]);
    });

    it('falls back to the * group', () => {
      expect(rulesFor(parseRobotsTxt(content), 'somebot')).toHaveLength(2);
    });
  });

  describe('isAllowedByRobots', () => {
    const rules = parseRobotsTxt(content);

    it('blocks paths under a Disallow prefix', () => {
      expect(isAllowedByRobots('/private', rules, 'somebot')).toBe(false);
      expect(isAllowedByRobots('/private/x', rules, 'somebot')).toBe(false);
    });

    it('lets the longest matching rule win', () => {
      expect(isAllowedByRobots('/private/open/a', rules, 'somebot')).toBe(true);
    });

    it('allows paths no rule matches', () => {
      expect(isAllowedByRobots('/public', rules, 'somebot')).toBe(true);
    });

    it('uses only the named group for a matching agent', () => {
      expect(isAllowedByRobots('/nolinkprobe', rules, 'linkprobe')).toBe(false);
      expect(isAllowedByRobots('/private', rules, 'linkprobe')).toBe(true);
    });

    it('supports * wildcards and $ anchors', () => {
      const wild = parseRobotsTxt('User-agent: *\nDisallow: /*.pdf$\nDisallow: /tmp*/cache\n');
      expect(isAllowedByRobots('/docs/a.pdf', wild, 'bot')).toBe(false);
      expect(isAllowedByRobots('/docs/a.pdf?x=1', wild, 'bot')).toBe(true);
      expect(isAllowedByRobots('/tmp-1/cache/x', wild, 'bot')).toBe(false);
    });

    it('lets Allow win a tie', () => {
      const tie = parseRobotsTxt('User-agent: *\nDisallow: /page\nAllow: /page\n');
      expect(isAllowedByRobots('/page', tie, 'bot')).toBe(true);
    });

    it('treats special characters in patterns literally', () => {
      const special = parseRobotsTxt('User-agent: *\nDisallow: /a.b?c\n');
      expect(isAllowedByRobots('/a.b?c=1', special, 'bot')).toBe(false);
      expect(isAllowedByRobots('/axb?c=1', special, 'bot')).toBe(true);
    });
  });
});

describe('StatusReporter', () => {
  function collector(): { lines: string[]; write: (chunk: string) => boolean } {
    const lines: string[] = [];
    return {
      lines,
      write: (chunk: string) => {
        lines.push(chunk);
        return true;
      },
    };
  }

  it('prints every status by default', () => {
    const out = collector();
    const reporter = new StatusReporter(undefined, out);

    expect(reporter.report({ status: 200, url: 'http://site.test/' })).toBe(true);
    expect(reporter.report({ status: 'ERR', url: 'http://site.test/down' })).toBe(true);
    expect(out.lines).toEqual(['200\thttp://site.test/\n', 'ERR\thttp://site.test/down\n']);
  });

  it('prints only statuses matching the filter', () => {
    const out = collector();
    const reporter = new StatusReporter('[45]', out);

    reporter.report({ status: 200, url: 'http://site.test/' });
    reporter.report({ status: 404, url: 'http://site.test/missing' });
    reporter.report({ status: 'ERR', url: 'http://site.test/down' });

    expect(out.lines).toEqual(['404\thttp://site.test/missing\n']);
  });

  it('matches the filter from the start of the status', () => {
    const reporter = new StatusReporter('0', collector());
    expect(reporter.accepts(404)).toBe(false);
    expect(new StatusReporter('ERR', collector()).accepts('ERR')).toBe(true);
  });
});
