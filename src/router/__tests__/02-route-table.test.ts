/**
 * Router Tests - Route Table
 */

import { createRouter, Router } from '../router';
import { silentLogger } from '../../__tests__/helpers';

const noop = () => undefined;

describe('Route table', () => {
  let router: Router;

  beforeEach(() => {
    router = createRouter({ logger: silentLogger().logger });
    router.path('/test').get(noop);
  });

  describe('findRoute()', () => {
    it('should find a literal route', () => {
      const route = router.findRoute('/test');

      expect(route?.template).toBe('/test');
    });

    it('should not find a partial match', () => {
      expect(router.findRoute('/test/test')).toBeUndefined();
    });

    it('should find the root route', () => {
      const root = router.path('/').get(noop);

      expect(router.findRoute('/')).toBe(root);
    });

    it('should find routes with variables', () => {
      const route = router.path('/with-var/:v');

      expect(router.findRoute('/with-var/27')).toBe(route);
      expect(router.findRoute('/with-var/test-test')).toBe(route);
    });

    it('should return the first registered match', () => {
      const first = router.path('/a/:x');
      router.path('/a/literal');

      expect(router.findRoute('/a/literal')).toBe(first);
    });
  });

  describe('groups', () => {
    it('should resolve routes in nested groups', () => {
      const route = router.group('/group').group('/nested').path('/test');

      expect(router.findRoute('/group/nested/test')).toBe(route);
    });

    it('should fall through when no child of a matching group matches', () => {
      router.group('/test').path('/child');
      const literal = router.path('/test/other');

      expect(router.findRoute('/test/other')).toBe(literal);
    });

    it('should respect segment boundaries on group prefixes', () => {
      router.group('/account').path('/list');
      const accountancy = router.path('/accountancy');

      expect(router.findRoute('/accountancy')).toBe(accountancy);
      expect(router.findRoute('/accountancy/list')).toBeUndefined();
    });

    it('should answer the bare prefix with a root child', () => {
      const index = router.group('/api').path('/');

      expect(router.findRoute('/api')).toBe(index);
      expect(router.findRoute('/api/')).toBe(index);
    });

    it('should return the fragment and group captures', () => {
      const route = router.group('/users/:userId').path('/posts/:postId');
      const match = router.resolve('/users/7/posts/9');

      expect(match?.route).toBe(route);
      expect(match?.fragment).toBe('/posts/9');
      expect(match?.captured).toEqual([['userId', '7']]);
    });
  });

  describe('routes()', () => {
    it('should list full templates with methods in search order', () => {
      const fresh = createRouter({ logger: silentLogger().logger });
      fresh.path('/').get(noop);
      const api = fresh.group('/api');
      api.path('/items').get(noop).post(noop);
      api.group('/v2/').path('/').get(noop);

      expect(fresh.routes()).toEqual([
        { template: '/', methods: ['GET'] },
        { template: '/api/items', methods: ['GET', 'POST'] },
        { template: '/api/v2', methods: ['GET'] },
      ]);
    });
  });

  describe('Route.on()', () => {
    it('should overwrite a handler registered for the same method', () => {
      const first = jest.fn();
      const second = jest.fn();
      const route = router.path('/dup').on('get', first).on('GET', second);

      expect(route.methods).toEqual(['GET']);
      expect(route.handlerFor('get')).toBe(second);
    });
  });
});
