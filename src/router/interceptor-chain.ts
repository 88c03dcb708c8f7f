/**
 * Interceptor Chain
 */

import type { RequestContext } from '../context';
import type { Interceptor } from './types';

/**
 * Router-global interceptors first, then the route's own, as one frozen sequence
 */
export function composeChain(
  global: readonly Interceptor[],
  local: readonly Interceptor[]
): readonly Interceptor[] {
  return Object.freeze([...global, ...local]);
}

/**
 * Run interceptors in order until the sequence ends or the context is aborted.
 * Returns true when the chain ran to completion.
 */
export async function runInterceptors(
  chain: readonly Interceptor[],
  ctx: RequestContext
): Promise<boolean> {
  for (const interceptor of chain) {
    if (ctx.aborted) {
      return false;
    }
    await interceptor(ctx);
  }

  return !ctx.aborted;
}
