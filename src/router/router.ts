/**
 * Router
 *
 * Top-level route table plus router-global interceptors. Finish all
 * registration before serving: nothing here is synchronised.
 */

import { DEFAULT_CONFIG } from '../config';
import type { SwitchyardConfig } from '../config';
import type { DispatchInput, ResponseWriter } from '../context';
import { createLogger } from '../logging';
import type { Logger } from '../logging';
import { Dispatcher } from './dispatcher';
import type { DispatchSource } from './dispatcher';
import { Route } from './route';
import { RouteGroup } from './route-group';
import { listRoutes, resolve } from './route-table';
import type { DispatchOutcome, Interceptor, Matchable, RouteInfo, RouteMatch } from './types';

export interface RouterOptions {
  config?: SwitchyardConfig;
  logger?: Logger;
}

export class Router implements DispatchSource {
  readonly config: SwitchyardConfig;
  readonly logger: Logger;

  private readonly table: Matchable[] = [];
  private readonly globalInterceptors: Interceptor[] = [];
  private readonly dispatcher: Dispatcher;

  constructor(options: RouterOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.logger = options.logger ?? createLogger({ level: this.config.debug ? 'debug' : 'info' });
    this.dispatcher = new Dispatcher(this, { logger: this.logger, logging: this.config.logging });
  }

  get entries(): readonly Matchable[] {
    return this.table;
  }

  get interceptors(): readonly Interceptor[] {
    return this.globalInterceptors;
  }

  /**
   * Register a route
   */
  path(template: string): Route {
    const route = new Route(template);
    this.table.push(route);
    return route;
  }

  /**
   * Register a group
   */
  group(prefix: string): RouteGroup {
    const group = new RouteGroup(prefix);
    this.table.push(group);
    return group;
  }

  /**
   * Add router-global interceptors. They run before route and group
   * interceptors on every dispatched request, whenever they were added.
   */
  use(...interceptors: Interceptor[]): this {
    this.globalInterceptors.push(...interceptors);
    return this;
  }

  resolve(path: string): RouteMatch | null {
    return resolve(this.table, path);
  }

  findRoute(path: string): Route | undefined {
    return this.resolve(path)?.route;
  }

  routes(): RouteInfo[] {
    return listRoutes(this.table);
  }

  dispatch(input: DispatchInput, writer: ResponseWriter): Promise<DispatchOutcome> {
    return this.dispatcher.dispatch(input, writer);
  }
}

/**
 * Factory function
 */
export function createRouter(options?: RouterOptions): Router {
  return new Router(options);
}
