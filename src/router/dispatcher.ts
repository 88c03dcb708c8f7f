/**
 * Dispatcher
 *
 * Per-request lifecycle: resolve, check method, bind variables, run the
 * interceptor chain, invoke the handler, send exactly one response.
 */

import { RequestContext, coercePathValue, createRequestInfo } from '../context';
import type { DispatchInput, ResponseWriter, VariableBag } from '../context';
import type { LoggingConfig } from '../config';
import type { Logger } from '../logging';
import { composeChain, runInterceptors } from './interceptor-chain';
import { resolve } from './route-table';
import type {
  DispatchOutcome,
  DispatchResult,
  DispatchState,
  Interceptor,
  Matchable,
  RouteMatch,
} from './types';

export const NOT_FOUND_BODY = '404 - Not Found';
export const METHOD_NOT_ALLOWED_BODY = '405 - Method Not Allowed';

/** What the dispatcher reads from its router */
export interface DispatchSource {
  readonly entries: readonly Matchable[];
  readonly interceptors: readonly Interceptor[];
}

export interface DispatcherOptions {
  logger: Logger;
  logging: LoggingConfig;
}

/**
 * Bind group-captured values, then the route's own variables taken from
 * the fragment left after the group prefixes. Innermost wins on a name clash.
 */
export function bindVariables(match: RouteMatch, bag: VariableBag): void {
  for (const [name, raw] of match.captured) {
    bag.set(name, coercePathValue(raw));
  }

  const { variables } = match.route;
  if (variables.size === 0) {
    return;
  }

  const segments = match.fragment.split('/');
  for (const [name, index] of variables) {
    if (index < segments.length) {
      bag.set(name, coercePathValue(segments[index]));
    }
  }
}

export class Dispatcher {
  private readonly logger: Logger;
  private readonly logging: LoggingConfig;

  constructor(
    private readonly source: DispatchSource,
    options: DispatcherOptions
  ) {
    this.logger = options.logger;
    this.logging = options.logging;
  }

  /**
   * Dispatch one request. Handler and interceptor errors propagate to the
   * caller; in that case nothing has been sent unless the handler sent it.
   */
  async dispatch(input: DispatchInput, writer: ResponseWriter): Promise<DispatchOutcome> {
    const startedAt = Date.now();
    const ctx = new RequestContext(createRequestInfo(input), writer);
    const trace: DispatchState[] = ['received'];

    if (this.logging.requests) {
      this.logger.info('Incoming request', { id: ctx.id, method: ctx.method, path: ctx.path });
    }

    const { result, route } = await this.run(ctx, trace);

    if (!ctx.response.sent) {
      ctx.response.send();
    }
    trace.push('response_sent');

    const durationMs = Date.now() - startedAt;
    if (this.logging.responses) {
      this.logger.info('Response sent', {
        id: ctx.id,
        status: ctx.response.statusCode,
        length: ctx.response.body.length,
        durationMs,
      });
    }

    return {
      result,
      status: ctx.response.statusCode,
      requestId: ctx.id,
      route,
      trace,
      durationMs,
    };
  }

  private async run(
    ctx: RequestContext,
    trace: DispatchState[]
  ): Promise<{ result: DispatchResult; route?: string }> {
    const match = resolve(this.source.entries, ctx.path);
    if (!match) {
      trace.push('not_found');
      ctx.response.error(NOT_FOUND_BODY, 404);
      return { result: 'not_found' };
    }
    trace.push('resolved');

    const { route } = match;
    const handler = route.handlerFor(ctx.method);
    if (!handler) {
      trace.push('method_not_allowed');
      ctx.response.header('Allow', route.methods.join(', ')).error(METHOD_NOT_ALLOWED_BODY, 405);
      return { result: 'method_not_allowed', route: route.template };
    }
    trace.push('method_checked');

    bindVariables(match, ctx.variables);
    trace.push('variables_bound');

    trace.push('chain_running');
    const chain = composeChain(this.source.interceptors, route.interceptors);
    const completed = await runInterceptors(chain, ctx);
    if (!completed) {
      trace.push('aborted');
      this.logger.debug('Interceptor aborted request', { id: ctx.id, path: ctx.path });
      return { result: 'aborted', route: route.template };
    }

    const returned = await handler(ctx);
    trace.push('handler_invoked');

    if (!returned && !ctx.response.touched && !ctx.response.sent) {
      this.logger.warn('Handler produced no response, sending default', { path: ctx.path });
    }

    return { result: 'handled', route: route.template };
  }
}
