import { describe, expect, test } from 'vitest';
import { formatRoutes, inspectRoutes, resourceName } from '../../src/core/inspect.js';
import { Router } from '../../src/core/router.js';

class UsersResource {}

function buildRouter(): Router<unknown, string> {
  const router = new Router<unknown, string>();
  router.addRoute('/users', { GET: 'list', POST: 'create' }, new UsersResource());
  router.addRoute('/users/{id:int(min=1)}', { GET: 'show' }, 'ItemResource');
  router.addRoute('/diff/{a}...{b:uuid}', {}, function DiffResource() {});
  return router;
}

describe('inspectRoutes', () => {
  test('describes routes in registration order', () => {
    expect(inspectRoutes(buildRouter())).toEqual([
      { template: '/users', resource: 'UsersResource', methods: ['GET', 'POST'], fields: [] },
      {
        template: '/users/{id:int(min=1)}',
        resource: 'ItemResource',
        methods: ['GET'],
        fields: [{ name: 'id', converter: 'int', args: 'min=1' }],
      },
      {
        template: '/diff/{a}...{b:uuid}',
        resource: 'DiffResource',
        methods: [],
        fields: [
          { name: 'a', converter: null, args: null },
          { name: 'b', converter: 'uuid', args: null },
        ],
      },
    ]);
  });
});

describe('formatRoutes', () => {
  test('one line per route', () => {
    expect(formatRoutes(inspectRoutes(buildRouter()))).toBe(
      [
        '• Routes:',
        '    ⇒ /users - UsersResource',
        '    ⇒ /users/{id:int(min=1)} - ItemResource',
        '    ⇒ /diff/{a}...{b:uuid} - DiffResource',
      ].join('\n')
    );
  });

  test('verbose lists methods', () => {
    expect(formatRoutes(inspectRoutes(buildRouter()), { verbose: true })).toBe(
      [
        '• Routes:',
        '    ⇒ /users - UsersResource:',
        '       ├── GET',
        '       └── POST',
        '    ⇒ /users/{id:int(min=1)} - ItemResource:',
        '       └── GET',
        '    ⇒ /diff/{a}...{b:uuid} - DiffResource',
      ].join('\n')
    );
  });

  test('no routes', () => {
    expect(formatRoutes([])).toBe('• Routes:');
  });
});

describe('resourceName', () => {
  test('names common resource handles', () => {
    expect(resourceName('Plain')).toBe('Plain');
    expect(resourceName(new UsersResource())).toBe('UsersResource');
    expect(resourceName({})).toBe('Object');
    expect(resourceName(Object.create(null))).toBe('<object>');
    expect(resourceName(function handler() {})).toBe('handler');
    expect(resourceName(42)).toBe('42');
  });
});
