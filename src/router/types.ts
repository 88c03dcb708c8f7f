/**
 * Router Types
 */

import type { RequestContext, ResponseBuilder } from '../context';
import type { Route } from './route';
import type { RouteGroup } from './route-group';

// ============================================================================
// Handlers
// ============================================================================

export type HTTPMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'HEAD' | 'OPTIONS';

/** A handler either returns the context's response or populates it in place */
export type HandlerResult = ResponseBuilder | void;

export type Handler = (ctx: RequestContext) => HandlerResult | Promise<HandlerResult>;

/**
 * Same shape as a handler. Only ctx.abort() influences the chain;
 * return values are ignored.
 */
export type Interceptor = Handler;

// ============================================================================
// Route Table
// ============================================================================

/** Route or group: the two things a route table holds */
export type Matchable = Route | RouteGroup;

export interface RouteMatch {
  route: Route;

  /** Path left after every enclosing group prefix was stripped */
  fragment: string;

  /** Raw variable values captured by enclosing group prefixes, outermost first */
  captured: Array<[string, string]>;
}

export interface RouteInfo {
  /** Group prefixes joined with the route template */
  template: string;
  methods: string[];
}

// ============================================================================
// Dispatch
// ============================================================================

export type DispatchState =
  | 'received'
  | 'resolved'
  | 'not_found'
  | 'method_checked'
  | 'method_not_allowed'
  | 'variables_bound'
  | 'chain_running'
  | 'aborted'
  | 'handler_invoked'
  | 'response_sent';

export type DispatchResult = 'not_found' | 'method_not_allowed' | 'aborted' | 'handled';

export interface DispatchOutcome {
  result: DispatchResult;
  status: number;
  requestId: string;

  /** Template of the matched route */
  route?: string;

  /** States visited, in order */
  trace: DispatchState[];
  durationMs: number;
}
