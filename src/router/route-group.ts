/**
 * Route Group
 *
 * Prefix-scoped container of routes and nested groups. Interceptors added
 * with use() reach only children registered afterwards.
 */

import { compilePrefix } from './pattern-compiler';
import type { CompiledPattern } from './pattern-compiler';
import { Route } from './route';
import type { Interceptor, Matchable } from './types';

export interface PrefixMatch {
  /** Path after the prefix */
  remainder: string;

  /** Raw values of the prefix's own variables */
  captured: Array<[string, string]>;
}

export class RouteGroup {
  readonly kind = 'group' as const;
  readonly prefix: string;

  private readonly pattern: CompiledPattern;
  private readonly children: Matchable[] = [];
  private readonly groupInterceptors: Interceptor[];

  constructor(prefix: string, inherited: readonly Interceptor[] = []) {
    this.prefix = prefix;
    this.pattern = compilePrefix(prefix);
    this.groupInterceptors = [...inherited];
  }

  get entries(): readonly Matchable[] {
    return this.children;
  }

  get interceptors(): readonly Interceptor[] {
    return this.groupInterceptors;
  }

  matchesPath(path: string): boolean {
    return this.pattern.regex.test(path);
  }

  /**
   * Strip the prefix from `path`, or null when the prefix does not match
   */
  matchPrefix(path: string): PrefixMatch | null {
    const match = this.pattern.regex.exec(path);
    if (!match) {
      return null;
    }

    const consumed = match[0];
    const captured: Array<[string, string]> = [];
    if (this.pattern.variables.size > 0) {
      const segments = consumed.split('/');
      for (const [name, index] of this.pattern.variables) {
        captured.push([name, segments[index]]);
      }
    }

    return { remainder: path.slice(consumed.length), captured };
  }

  /**
   * Register a child route, seeded with the group's current interceptors
   */
  path(template: string): Route {
    const route = new Route(template, this.groupInterceptors);
    this.children.push(route);
    return route;
  }

  /**
   * Register a nested group, seeded with the group's current interceptors
   */
  group(prefix: string): RouteGroup {
    const nested = new RouteGroup(prefix, this.groupInterceptors);
    this.children.push(nested);
    return nested;
  }

  /**
   * Call before registering the children it should apply to
   */
  use(...interceptors: Interceptor[]): this {
    this.groupInterceptors.push(...interceptors);
    return this;
  }
}
