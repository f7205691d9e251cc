/**
 * Parse robots.txt into user-agent groups and evaluate Allow/Disallow rules
 */

export interface RobotsRule {
  allow: boolean;
  /** Path pattern as written; may contain `*` wildcards and a trailing `$`. */
  pattern: string;
}

export interface RobotsGroup {
  /** Lowercased user-agent values heading the group. */
  agents: string[];
  rules: RobotsRule[];
}

export interface RobotsRules {
  groups: RobotsGroup[];
}

/**
 * Parse robots.txt content into groups.
 * Consecutive User-agent lines share one group; a User-agent line after any rule starts a new one.
 * Rules before the first User-agent line are ignored.
 */
export function parseRobotsTxt(content: string): RobotsRules {
  const groups: RobotsGroup[] = [];
  let current: RobotsGroup | null = null;
  let collectingAgents = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    const field = line.slice(0, colonIdx).trim().toLowerCase();
    const value = line.slice(colonIdx + 1).trim();

    if (field === 'user-agent') {
      if (!current || !collectingAgents) {
        current = { agents: [], rules: [] };
        groups.push(current);
      }
      current.agents.push(value.toLowerCase());
      collectingAgents = true;
      continue;
    }

    if (field !== 'allow' && field !== 'disallow') continue;
    collectingAgents = false;
    if (!current) continue;

    // An empty Disallow allows everything; it adds no rule.
    if (!value) continue;
    current.rules.push({ allow: field === 'allow', pattern: value });
  }

  return { groups };
}

/** Product token of a user agent: `linkprobe/1.0 (+info)` → `linkprobe`. */
function productToken(userAgent: string): string {
  return userAgent.trim().split(/[\s/]/, 1)[0].toLowerCase();
}

/**
 * Rules that apply to a user agent: those of every group naming its product token,
 * or of the `*` groups when none does.
 */
export function rulesFor(rules: RobotsRules, userAgent: string): RobotsRule[] {
  const token = productToken(userAgent);
  const named = rules.groups.filter((g) => g.agents.some((a) => a !== '*' && a === token));
  const chosen = named.length > 0 ? named : rules.groups.filter((g) => g.agents.includes('*'));
  return chosen.flatMap((g) => g.rules);
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}${anchored ? '$' : ''}`);
}

/**
 * Check a path (with query) against robots rules for a user agent.
 * The longest matching pattern wins; Allow wins a tie. No match means allowed.
 */
export function isAllowedByRobots(urlPath: string, rules: RobotsRules, userAgent: string): boolean {
  let best: RobotsRule | null = null;

  for (const rule of rulesFor(rules, userAgent)) {
    if (!patternToRegExp(rule.pattern).test(urlPath)) continue;
    if (
      !best ||
      rule.pattern.length > best.pattern.length ||
      (rule.pattern.length === best.pattern.length && rule.allow)
    ) {
      best = rule;
    }
  }

  return best?.allow ?? true;
}
