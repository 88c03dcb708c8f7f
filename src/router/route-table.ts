/**
 * Route Table Search
 *
 * Ordered linear search: first match wins, registration order is the only
 * precedence. A route match ends the search; a group whose prefix matches
 * but holds no matching child falls through to the entries after it.
 */

import type { Matchable, RouteInfo, RouteMatch } from './types';

export function resolve(
  entries: readonly Matchable[],
  path: string,
  captured: Array<[string, string]> = []
): RouteMatch | null {
  for (const entry of entries) {
    if (entry.kind === 'route') {
      if (entry.matchesPath(path)) {
        return { route: entry, fragment: path, captured };
      }
      continue;
    }

    const prefix = entry.matchPrefix(path);
    if (!prefix) {
      continue;
    }

    const found = resolve(entry.entries, prefix.remainder, [...captured, ...prefix.captured]);
    if (found) {
      return found;
    }
  }

  return null;
}

function joinTemplate(prefix: string, template: string): string {
  const head = prefix.replace(/\/+$/, '');
  const tail = template.startsWith('/') ? template : `/${template}`;
  if (tail === '/') {
    return head || '/';
  }
  return head + tail;
}

/**
 * Every route with its full template, in search order
 */
export function listRoutes(entries: readonly Matchable[], prefix: string = ''): RouteInfo[] {
  const routes: RouteInfo[] = [];

  for (const entry of entries) {
    if (entry.kind === 'route') {
      routes.push({ template: joinTemplate(prefix, entry.template), methods: entry.methods });
    } else {
      routes.push(...listRoutes(entry.entries, joinTemplate(prefix, entry.prefix)));
    }
  }

  return routes;
}
