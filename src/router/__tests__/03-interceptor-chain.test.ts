/**
 * Router Tests - Interceptor Chain
 */

import { RequestContext, createRequestInfo } from '../../context';
import { composeChain, runInterceptors } from '../interceptor-chain';
import { createRouter } from '../router';
import type { Interceptor } from '../types';
import { RecordingWriter, silentLogger } from '../../__tests__/helpers';

function createContext(): RequestContext {
  return new RequestContext(createRequestInfo({ method: 'GET', path: '/' }), new RecordingWriter());
}

describe('runInterceptors()', () => {
  it('should run every interceptor in order and report completion', async () => {
    const order: number[] = [];
    const chain: Interceptor[] = [() => void order.push(1), () => void order.push(2), () => void order.push(3)];

    const completed = await runInterceptors(chain, createContext());

    expect(completed).toBe(true);
    expect(order).toEqual([1, 2, 3]);
  });

  it('should stop after the interceptor that aborts', async () => {
    const third = jest.fn();
    const chain: Interceptor[] = [jest.fn(), (ctx) => ctx.abort(), third];
    const ctx = createContext();

    const completed = await runInterceptors(chain, ctx);

    expect(completed).toBe(false);
    expect(ctx.aborted).toBe(true);
    expect(third).not.toHaveBeenCalled();
  });

  it('should await asynchronous interceptors', async () => {
    const order: string[] = [];
    const chain: Interceptor[] = [
      async () => {
        await new Promise<void>((resolve) => setTimeout(resolve, 5));
        order.push('slow');
      },
      () => void order.push('fast'),
    ];

    await runInterceptors(chain, createContext());

    expect(order).toEqual(['slow', 'fast']);
  });

  it('should ignore interceptor return values', async () => {
    const ctx = createContext();
    const chain: Interceptor[] = [(c) => c.response.status(418), jest.fn()];

    expect(await runInterceptors(chain, ctx)).toBe(true);
  });
});

describe('composeChain()', () => {
  it('should put global interceptors first and freeze the result', () => {
    const global: Interceptor = jest.fn();
    const local: Interceptor = jest.fn();

    const chain = composeChain([global], [local]);

    expect(chain).toEqual([global, local]);
    expect(Object.isFrozen(chain)).toBe(true);
  });
});

describe('Interceptor inheritance', () => {
  it('should seed children only with interceptors added before them', () => {
    const router = createRouter({ logger: silentLogger().logger });
    const a: Interceptor = jest.fn();
    const b: Interceptor = jest.fn();

    const group = router.group('/g');
    group.use(a);
    const early = group.path('/one');
    group.use(b);
    const late = group.path('/two');

    expect(early.interceptors).toEqual([a]);
    expect(late.interceptors).toEqual([a, b]);
  });

  it('should seed nested groups with the parent interceptors present at creation', () => {
    const router = createRouter({ logger: silentLogger().logger });
    const a: Interceptor = jest.fn();
    const b: Interceptor = jest.fn();
    const c: Interceptor = jest.fn();

    const parent = router.group('/p').use(a);
    const nested = parent.group('/n');
    parent.use(b);
    const route = nested.path('/r').use(c);

    expect(nested.interceptors).toEqual([a]);
    expect(route.interceptors).toEqual([a, c]);
  });
});
