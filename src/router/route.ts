/**
 * Route
 *
 * One path template bound to per-method handlers and route-local interceptors.
 */

import { compileTemplate } from './pattern-compiler';
import type { CompiledPattern } from './pattern-compiler';
import type { Handler, HTTPMethod, Interceptor } from './types';

export class Route {
  readonly kind = 'route' as const;
  readonly template: string;

  private readonly pattern: CompiledPattern;
  private readonly handlers = new Map<string, Handler>();
  private readonly localInterceptors: Interceptor[];

  /**
   * @param inherited - interceptors of the enclosing group at creation time
   */
  constructor(template: string, inherited: readonly Interceptor[] = []) {
    this.template = template;
    this.pattern = compileTemplate(template);
    this.localInterceptors = [...inherited];
  }

  get variables(): ReadonlyMap<string, number> {
    return this.pattern.variables;
  }

  get interceptors(): readonly Interceptor[] {
    return this.localInterceptors;
  }

  /** Registered methods, in registration order */
  get methods(): string[] {
    return [...this.handlers.keys()];
  }

  matchesPath(path: string): boolean {
    return this.pattern.regex.test(path);
  }

  handlerFor(method: string): Handler | undefined {
    return this.handlers.get(method.toUpperCase());
  }

  /**
   * Register a handler. A second handler for the same method replaces the first.
   */
  on(method: HTTPMethod | string, handler: Handler): this {
    this.handlers.set(method.toUpperCase(), handler);
    return this;
  }

  get(handler: Handler): this {
    return this.on('GET', handler);
  }

  post(handler: Handler): this {
    return this.on('POST', handler);
  }

  put(handler: Handler): this {
    return this.on('PUT', handler);
  }

  delete(handler: Handler): this {
    return this.on('DELETE', handler);
  }

  patch(handler: Handler): this {
    return this.on('PATCH', handler);
  }

  head(handler: Handler): this {
    return this.on('HEAD', handler);
  }

  options(handler: Handler): this {
    return this.on('OPTIONS', handler);
  }

  use(...interceptors: Interceptor[]): this {
    this.localInterceptors.push(...interceptors);
    return this;
  }
}
