/**
 * robots.txt Allow/Disallow evaluation
 *
 * Picks the group naming our user agent (falling back to `*`) and applies
 * the longest matching rule; on a tie Allow wins. Supports the `*` and `$`
 * path wildcards.
 */

import { HttpClient } from '../scraper/http-client.js';
import { siteRootUrl } from '../utils/canonicalize.js';
import { isAbortError } from '../utils/sleep.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

interface RobotsRule {
  allow: boolean;
  path: string;
  pattern: RegExp;
}

interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
}

export class RobotsRules {
  private constructor(private readonly rules: RobotsRule[]) {}

  static allowAll(): RobotsRules {
    return new RobotsRules([]);
  }

  static parse(text: string, userAgent: string): RobotsRules {
    const groups: RobotsGroup[] = [];
    let current: RobotsGroup | null = null;
    let groupHasRules = false;

    for (const rawLine of text.split(/\r?\n/)) {
      const line = rawLine.replace(/#.*$/, '').trim();
      const separator = line.indexOf(':');
      if (separator <= 0) continue;

      const field = line.slice(0, separator).trim().toLowerCase();
      const value = line.slice(separator + 1).trim();

      if (field === 'user-agent') {
        if (!current || groupHasRules) {
          current = { agents: [], rules: [] };
          groups.push(current);
          groupHasRules = false;
        }
        current.agents.push(value.toLowerCase());
      } else if (field === 'allow' || field === 'disallow') {
        if (!current) continue;
        groupHasRules = true;
        // An empty Disallow allows everything
        if (value) {
          current.rules.push({ allow: field === 'allow', path: value, pattern: compileRulePath(value) });
        }
      }
    }

    const token = userAgent.split('/')[0].trim().toLowerCase();
    const specific = groups.filter((group) =>
      group.agents.some((agent) => agent !== '*' && token.length > 0 && token.includes(agent))
    );
    const selected = specific.length > 0
      ? specific
      : groups.filter((group) => group.agents.includes('*'));

    return new RobotsRules(selected.flatMap((group) => group.rules));
  }

  isAllowed(url: string): boolean {
    let path: string;
    try {
      const parsed = new URL(url);
      path = parsed.pathname + parsed.search;
    } catch {
      return true;
    }

    let best: RobotsRule | null = null;
    for (const rule of this.rules) {
      if (!rule.pattern.test(path)) continue;
      if (
        !best ||
        rule.path.length > best.path.length ||
        (rule.path.length === best.path.length && rule.allow)
      ) {
        best = rule;
      }
    }
    return best ? best.allow : true;
  }
}

function compileRulePath(path: string): RegExp {
  const anchored = path.endsWith('$');
  const body = (anchored ? path.slice(0, -1) : path)
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${body}${anchored ? '$' : ''}`);
}

/**
 * Loads the site's robots.txt; a missing or unreadable file allows everything
 */
export async function fetchRobotsRules(
  http: HttpClient,
  siteUrl: string,
  userAgent: string,
  signal?: AbortSignal
): Promise<RobotsRules> {
  const robotsUrl = siteRootUrl(siteUrl, '/robots.txt');

  try {
    const response = await http.getText(robotsUrl, { userAgent, signal });
    if (response.status < 200 || response.status >= 300) {
      logger.debug('No robots.txt, allowing all', { robotsUrl, status: response.status });
      return RobotsRules.allowAll();
    }
    return RobotsRules.parse(response.data, userAgent);
  } catch (error) {
    if (isAbortError(error)) throw error;
    logger.warn('Could not read robots.txt, allowing all', { robotsUrl, error: errorMessage(error) });
    return RobotsRules.allowAll();
  }
}
