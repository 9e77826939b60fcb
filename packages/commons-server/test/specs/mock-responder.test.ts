import { deepEqual, equal, ok, throws } from 'node:assert';
import { describe, it } from 'node:test';
import {
  ConfigValidationError,
  MalformedMockTemplateError,
  MockResponder
} from '../../src';

describe('Mock responder', () => {
  const responder = MockResponder.compile([
    {
      name: 'llama',
      path: '/v1/models/meta/llama',
      body: { name: 'llama', namespace: 'meta' }
    },
    {
      template: '/v1/models/:namespace/:name',
      headers: { 'x-mock': 'template' },
      body: '{"id":"{{namespace}}/{{name}}"}'
    },
    {
      pattern: '/v1/jobs/(\\d+)',
      statusCode: 202,
      contentType: 'text/plain',
      body: 'job {{$1}} queued'
    },
    {
      pattern: '/v1/files/(?<file>.+)',
      methods: ['get'],
      body: '{{file}}'
    }
  ]);

  it('should answer exact paths before templates', () => {
    const result = responder.respond('/v1/models/meta/llama', 'GET');

    ok(result.matched);
    equal(result.entry.name, 'llama');
    equal(result.statusCode, 200);
    equal(result.contentType, 'application/json');
    equal(result.body, '{"name":"llama","namespace":"meta"}');
  });

  it('should fill template bodies from the path parameters', () => {
    const result = responder.respond('/v1/models/nvidia/nemotron', 'GET');

    ok(result.matched);
    deepEqual(result.captures, { namespace: 'nvidia', name: 'nemotron' });
    deepEqual(result.headers, { 'x-mock': 'template' });
    equal(result.body, '{"id":"nvidia/nemotron"}');
  });

  it('should expose numbered regex groups', () => {
    const result = responder.respond('/v1/jobs/42', 'POST');

    ok(result.matched);
    equal(result.statusCode, 202);
    equal(result.contentType, 'text/plain');
    deepEqual(result.captures, { $1: '42' });
    equal(result.body, 'job 42 queued');
  });

  it('should anchor regexes at both ends', () => {
    deepEqual(responder.respond('/v1/jobs/42/logs', 'GET'), { matched: false });
    deepEqual(responder.respond('/api/v1/jobs/42', 'GET'), { matched: false });
  });

  it('should expose named regex groups by name', () => {
    const result = responder.respond('/v1/files/a/b.txt', 'GET');

    ok(result.matched);
    deepEqual(result.captures, { $1: 'a/b.txt', file: 'a/b.txt' });
    equal(result.body, 'a/b.txt');
  });

  it('should only answer the methods an entry lists', () => {
    deepEqual(responder.respond('/v1/files/a.txt', 'POST'), { matched: false });
    equal(responder.respond('/v1/files/a.txt', 'get').matched, true);
  });

  it('should answer HEAD where GET is listed', () => {
    equal(responder.respond('/v1/files/a.txt', 'HEAD').matched, true);
    equal(
      MockResponder.compile([{ path: '/v1/health', methods: ['POST'] }]).respond(
        '/v1/health',
        'HEAD'
      ).matched,
      false
    );
  });

  it('should render optional parameters missing from the path as empty', () => {
    const optional = MockResponder.compile([
      { template: '/opt/:ns/:name?', contentType: 'text/plain', body: '{{ns}}:{{name}}' }
    ]);
    const result = optional.respond('/opt/meta', 'GET');

    ok(result.matched);
    deepEqual(result.captures, { ns: 'meta', name: '' });
    equal(result.body, 'meta:');

    const full = optional.respond('/opt/meta/llama', 'GET');

    ok(full.matched);
    equal(full.body, 'meta:llama');
  });

  it('should list entries in evaluation order', () => {
    deepEqual(
      responder.list().map((entry) => entry.name),
      ['llama', '/v1/models/:namespace/:name', '/v1/jobs/(\\d+)', '/v1/files/(?<file>.+)']
    );
    equal(responder.size, 4);
  });

  it('should let a higher priority win over the pattern kind', () => {
    const prioritized = MockResponder.compile([
      { template: '/items/:id', body: 'template' },
      { path: '/items/1', body: 'exact' },
      { pattern: '/items/.*', priority: 1, body: 'regex' }
    ]);
    const result = prioritized.respond('/items/1');

    ok(result.matched);
    equal(result.body, 'regex');
    deepEqual(
      prioritized.list().map((entry) => entry.name),
      ['/items/.*', '/items/1', '/items/:id']
    );
  });

  it('should prefer the template with the most literal text', () => {
    const templates = MockResponder.compile([
      { template: '/a/:x/:y', body: 'generic' },
      { template: '/a/b/:y', body: 'specific' }
    ]);
    const result = templates.respond('/a/b/c');

    ok(result.matched);
    equal(result.body, 'specific');
  });

  it('should keep declaration order between equivalent entries', () => {
    const twins = MockResponder.compile([
      { template: '/t/:a', body: 'first' },
      { template: '/t/:b', body: 'second' }
    ]);
    const result = twins.respond('/t/1');

    ok(result.matched);
    equal(result.body, 'first');
  });

  it('should default to an empty body and serialize non-string bodies', () => {
    const bodies = MockResponder.compile([
      { path: '/empty', statusCode: 204 },
      { path: '/count', body: 42 }
    ]);
    const empty = bodies.respond('/empty');
    const count = bodies.respond('/count');

    ok(empty.matched);
    equal(empty.body, '');
    equal(empty.statusCode, 204);
    ok(count.matched);
    equal(count.body, '42');
  });

  it('should reject invalid entries with a ConfigValidationError', () => {
    throws(
      () =>
        MockResponder.compile([
          { path: 'models' },
          { path: '/a', template: '/b' },
          { path: '/c', statusCode: 99 },
          { template: '/m/:id', body: '{{name}}' }
        ]),
      (error: unknown) => {
        ok(error instanceof ConfigValidationError);
        ok(!(error instanceof MalformedMockTemplateError));
        deepEqual(error.issues, [
          'mocks[0].path: must start with "/"',
          'mocks[1]: set exactly one of "path", "template" or "pattern"',
          'mocks[2].statusCode: must be an integer between 100 and 599',
          'mocks[3].body: body references unknown capture(s) name (available: id)'
        ]);

        return true;
      }
    );
  });

  it('should raise a MalformedMockTemplateError when only bodies are wrong', () => {
    throws(
      () =>
        MockResponder.compile([
          { template: '/m/:id', body: '{{id}}' },
          { pattern: '/r/(\\d+)', body: '{{$2}}' }
        ]),
      (error: unknown) => {
        ok(error instanceof MalformedMockTemplateError);
        deepEqual(error.issues, [
          'mocks[1].body: body references unknown capture(s) $2 (available: $1)'
        ]);

        return true;
      }
    );
  });
});
