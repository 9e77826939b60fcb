import { deepEqual, equal, ok, throws } from 'node:assert';
import { describe, it } from 'node:test';
import { ConfigValidationError, RouteTable } from '../../src';

describe('Route table', () => {
  const table = RouteTable.compile([
    { prefix: '/v1', backend: 'http://platform.test' },
    { name: 'models', prefix: '/v1/models', backend: 'http://models.test/api/' },
    { prefix: '/static/', backend: 'http://files.test/assets' },
    { name: 'jobs', pattern: '/v[0-9]+/jobs', backend: 'http://jobs.test' },
    { name: 'duplicate', prefix: '/v1', backend: 'http://other.test' }
  ]);

  it('should pick the longest matching prefix', () => {
    const match = table.resolve('/v1/models/meta/llama');

    ok(match);
    equal(match.route.name, 'models');
    equal(match.matchedPrefix, '/v1/models');
    equal(match.remainder, '/meta/llama');
    equal(match.targetUrl, 'http://models.test/api/meta/llama');
  });

  it('should target the backend URL itself when the path equals the prefix', () => {
    equal(table.resolve('/v1/models')?.targetUrl, 'http://models.test/api');
  });

  it('should append the query string as-is', () => {
    equal(
      table.resolve('/v1/models/x', '?page=2&sort=name')?.targetUrl,
      'http://models.test/api/x?page=2&sort=name'
    );
    equal(
      table.resolve('/v1/models', '?page=2')?.targetUrl,
      'http://models.test/api?page=2'
    );
  });

  it('should only match prefixes on segment boundaries', () => {
    const match = table.resolve('/v1/modelsx');

    equal(match?.route.name, '/v1');
    equal(match?.targetUrl, 'http://platform.test/modelsx');
  });

  it('should match inside the segment when the prefix ends with a slash', () => {
    equal(
      table.resolve('/static/logo.png')?.targetUrl,
      'http://files.test/assets/logo.png'
    );
    equal(table.resolve('/static'), undefined);
  });

  it('should use the text matched by a pattern as the prefix', () => {
    const match = table.resolve('/v2/jobs/42');

    equal(match?.route.name, 'jobs');
    equal(match?.matchedPrefix, '/v2/jobs');
    equal(match?.targetUrl, 'http://jobs.test/42');
  });

  it('should prefer the route declared first on equal prefixes', () => {
    const match = table.resolve('/v1/datasets');

    equal(match?.route.index, 0);
    equal(match?.targetUrl, 'http://platform.test/datasets');
  });

  it('should return nothing when no route matches', () => {
    equal(table.resolve('/health'), undefined);
    equal(table.resolve('/'), undefined);
  });

  it('should name routes after their prefix or pattern by default', () => {
    deepEqual(
      table.list().map((route) => route.name),
      ['/v1', 'models', '/static/', 'jobs', 'duplicate']
    );
    equal(table.size, 5);
  });

  it('should reject invalid routes with one issue per problem', () => {
    throws(
      () =>
        RouteTable.compile([
          { prefix: 'v1', backend: 'ftp://platform.test' },
          { backend: 'http://platform.test' },
          { prefix: '/a', pattern: '/b', backend: 'http://platform.test' },
          { prefix: '/query', backend: 'http://platform.test/?debug=1' }
        ]),
      (error: unknown) => {
        ok(error instanceof ConfigValidationError);
        deepEqual(error.issues, [
          'routes[0].backend: must be an absolute http(s) URL without query or fragment',
          'routes[0].prefix: must be a string starting with "/"',
          'routes[1]: a route needs a "prefix" or a "pattern"',
          'routes[2]: set either "prefix" or "pattern", not both',
          'routes[3].backend: must be an absolute http(s) URL without query or fragment'
        ]);

        return true;
      }
    );
  });

  it('should reject patterns that are not valid regular expressions', () => {
    throws(
      () => RouteTable.compile([{ pattern: '/jobs/(', backend: 'http://jobs.test' }]),
      (error: unknown) => {
        ok(error instanceof ConfigValidationError);
        equal(error.issues.length, 1);
        ok(error.issues[0].startsWith('routes[0].pattern: '));

        return true;
      }
    );
  });
});
