/**
 * Router Module
 */

export { Router, createRouter } from './router';
export type { RouterOptions } from './router';
export { Route } from './route';
export { RouteGroup } from './route-group';
export type { PrefixMatch } from './route-group';
export { compileTemplate, compilePrefix, VARIABLE_MARKER, VARIABLE_SEGMENT } from './pattern-compiler';
export type { CompiledPattern } from './pattern-compiler';
export { resolve, listRoutes } from './route-table';
export { composeChain, runInterceptors } from './interceptor-chain';
export { Dispatcher, bindVariables, NOT_FOUND_BODY, METHOD_NOT_ALLOWED_BODY } from './dispatcher';
export type { DispatchSource, DispatcherOptions } from './dispatcher';
export type {
  HTTPMethod,
  Handler,
  HandlerResult,
  Interceptor,
  Matchable,
  RouteMatch,
  RouteInfo,
  DispatchState,
  DispatchResult,
  DispatchOutcome,
} from './types';
