/**
 * robots.txt parsing and rule resolution.
 *
 * Groups are selected by the most specific user-agent token that matches the
 * crawler's name, falling back to `*`. Within the selected groups the longest
 * matching pattern decides; on equal length Allow wins.
 */

export interface RobotsRule {
  allow: boolean;
  pattern: string;
  matcher: RegExp;
}

export interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
}

export interface RobotsPolicy {
  groups: RobotsGroup[];
}

export const ALLOW_ALL: RobotsPolicy = { groups: [] };

function compilePattern(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}${anchored ? '$' : ''}`);
}

function normalizePath(path: string): string {
  // Compare percent-encodings case-insensitively and unescape unreserved chars.
  return path.replace(/%([0-9a-fA-F]{2})/g, (_m, hex: string) => {
    const ch = String.fromCharCode(parseInt(hex, 16));
    return /[A-Za-z0-9\-._~]/.test(ch) ? ch : `%${hex.toUpperCase()}`;
  });
}

export function parseRobots(text: string): RobotsPolicy {
  const groups: RobotsGroup[] = [];
  let current: RobotsGroup | null = null;
  let lastWasAgent = false;

  for (const rawLine of text.split(/\r\n|\r|\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const sep = line.indexOf(':');
    if (sep === -1) continue;
    const field = line.slice(0, sep).trim().toLowerCase();
    const value = line.slice(sep + 1).trim();

    if (field === 'user-agent') {
      if (!current || !lastWasAgent) {
        current = { agents: [], rules: [] };
        groups.push(current);
      }
      current.agents.push(value.toLowerCase());
      lastWasAgent = true;
      continue;
    }

    lastWasAgent = false;
    if (!current) continue;

    if (field === 'allow' || field === 'disallow') {
      // An empty Disallow means "nothing is disallowed".
      if (!value) continue;
      const pattern = normalizePath(value);
      current.rules.push({ allow: field === 'allow', pattern, matcher: compilePattern(pattern) });
    }
  }

  return { groups };
}

function productToken(userAgent: string): string {
  const token = userAgent.trim().split(/[\s/]/)[0] ?? '';
  return token.toLowerCase();
}

function selectGroups(policy: RobotsPolicy, userAgent: string): RobotsGroup[] {
  const token = productToken(userAgent);
  let best: RobotsGroup[] = [];
  let bestLength = 0;

  for (const group of policy.groups) {
    for (const agent of group.agents) {
      if (agent === '*' || !token || !token.includes(agent)) continue;
      if (agent.length > bestLength) {
        best = [group];
        bestLength = agent.length;
      } else if (agent.length === bestLength && !best.includes(group)) {
        best.push(group);
      }
    }
  }
  if (best.length > 0) return best;
  return policy.groups.filter((g) => g.agents.includes('*'));
}

export function isPathAllowed(policy: RobotsPolicy, userAgent: string, pathWithQuery: string): boolean {
  if (pathWithQuery === '/robots.txt') return true;

  const path = normalizePath(pathWithQuery || '/');
  let winner: RobotsRule | null = null;

  for (const group of selectGroups(policy, userAgent)) {
    for (const rule of group.rules) {
      if (!rule.matcher.test(path)) continue;
      if (
        !winner ||
        rule.pattern.length > winner.pattern.length ||
        (rule.pattern.length === winner.pattern.length && rule.allow && !winner.allow)
      ) {
        winner = rule;
      }
    }
  }

  return winner ? winner.allow : true;
}
