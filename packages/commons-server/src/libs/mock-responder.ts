import { validateHeaderName, validateHeaderValue } from 'http';
import { Key, MatchFunction, match, parse } from 'path-to-regexp';
import {
  ConfigValidationError,
  MalformedMockTemplateError,
  MockConfig,
  MockPatternKind
} from '../types/gateway-config';
import { TemplateParser, TemplateRenderer } from './template-parser';

export const defaultMockStatusCode = 200;
export const defaultMockContentType = 'application/json';

type CaptureMatcher = (pathname: string) => Record<string, string> | null;

export type CompiledMock = {
  name: string;
  kind: MockPatternKind;
  pattern: string;
  methods: string[] | null;
  priority: number;
  literalLength: number;
  index: number;
  statusCode: number;
  contentType: string;
  headers: Record<string, string>;
  captureNames: string[];
  matcher: CaptureMatcher;
  render: TemplateRenderer;
};

export type MockResult =
  | { matched: false }
  | {
      matched: true;
      entry: CompiledMock;
      statusCode: number;
      contentType: string;
      headers: Record<string, string>;
      body: string;
      captures: Record<string, string>;
    };

const kindRank: Record<MockPatternKind, number> = {
  exact: 0,
  template: 1,
  regex: 2
};

/**
 * Static or templated responses keyed by request path.
 *
 * Entries are tried by decreasing priority, then exact paths, templates and
 * regexes in that order, then longest literal text, then declaration order.
 * The first match answers.
 */
export class MockResponder {
  private constructor(private readonly entries: CompiledMock[]) {}

  /**
   * Validate and compile mock declarations, templates included.
   * Throws a ConfigValidationError (or MalformedMockTemplateError) listing
   * every invalid entry.
   *
   * @param mocks
   * @param location - prefix used in issue messages
   */
  public static compile(mocks: MockConfig[], location = 'mocks'): MockResponder {
    const issues: string[] = [];
    const compiled: CompiledMock[] = [];
    let onlyTemplateErrors = true;

    mocks.forEach((mock, index) => {
      const at = `${location}[${index}]`;

      try {
        compiled.push(compileMock(mock, index, at));
      } catch (error) {
        if (!(error instanceof ConfigValidationError)) {
          throw error;
        }

        issues.push(...error.issues);
        onlyTemplateErrors =
          onlyTemplateErrors && error instanceof MalformedMockTemplateError;
      }
    });

    if (issues.length > 0) {
      throw onlyTemplateErrors
        ? new MalformedMockTemplateError(issues.join('; '), issues)
        : new ConfigValidationError(issues.join('; '), issues);
    }

    compiled.sort(
      (a, b) =>
        b.priority - a.priority ||
        kindRank[a.kind] - kindRank[b.kind] ||
        b.literalLength - a.literalLength ||
        a.index - b.index
    );

    return new MockResponder(compiled);
  }

  public get size(): number {
    return this.entries.length;
  }

  /**
   * Entries in evaluation order
   */
  public list(): readonly CompiledMock[] {
    return this.entries;
  }

  /**
   * Answer a request path from the table, without side effects
   *
   * @param pathname
   * @param method - entries restricted to some methods only answer those
   * @returns
   */
  public respond(pathname: string, method?: string): MockResult {
    const upperMethod = method?.toUpperCase();

    for (const entry of this.entries) {
      if (
        entry.methods &&
        upperMethod !== undefined &&
        !acceptsMethod(entry.methods, upperMethod)
      ) {
        continue;
      }

      const captures = entry.matcher(pathname);

      if (captures) {
        return {
          matched: true,
          entry,
          statusCode: entry.statusCode,
          contentType: entry.contentType,
          headers: entry.headers,
          body: entry.render(captures),
          captures
        };
      }
    }

    return { matched: false };
  }
}

// HEAD is answered like GET, without the body
const acceptsMethod = (methods: string[], method: string): boolean =>
  methods.includes(method) || (method === 'HEAD' && methods.includes('GET'));

/**
 * Check that the headers of a mock can be set on a response
 */
const validateMockHeaders = (
  contentType: string,
  headers: Record<string, string>,
  at: string
): string[] => {
  const issues: string[] = [];
  const check = (location: string, validate: () => void) => {
    try {
      validate();
    } catch (error) {
      issues.push(
        `${location}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  };

  check(`${at}.contentType`, () => validateHeaderValue('Content-Type', contentType));
  Object.entries(headers).forEach(([name, value]) => {
    check(`${at}.headers.${name}`, () => {
      validateHeaderName(name);
      validateHeaderValue(name, value);
    });
  });

  return issues;
};

const compileMock = (
  mock: MockConfig,
  index: number,
  at: string
): CompiledMock => {
  const declared = (['path', 'template', 'pattern'] as const).filter(
    (key) => mock[key] !== undefined
  );

  if (declared.length !== 1) {
    throw new ConfigValidationError(
      `${at}: set exactly one of "path", "template" or "pattern"`
    );
  }

  const statusCode = mock.statusCode ?? defaultMockStatusCode;

  if (!Number.isInteger(statusCode) || statusCode < 100 || statusCode > 599) {
    throw new ConfigValidationError(
      `${at}.statusCode: must be an integer between 100 and 599`
    );
  }

  const contentType = mock.contentType ?? defaultMockContentType;
  const headers = mock.headers ?? {};
  const headerIssues = validateMockHeaders(contentType, headers, at);

  if (headerIssues.length > 0) {
    throw new ConfigValidationError(headerIssues.join('; '), headerIssues);
  }

  const { kind, pattern, matcher, captureNames, literalLength } =
    compileMatcher(mock, at);
  const body =
    mock.body === undefined
      ? ''
      : typeof mock.body === 'string'
      ? mock.body
      : JSON.stringify(mock.body);

  return {
    name: mock.name ?? pattern,
    kind,
    pattern,
    methods: mock.methods ? mock.methods.map((method) => method.toUpperCase()) : null,
    priority: mock.priority ?? 0,
    literalLength,
    index,
    statusCode,
    contentType,
    headers,
    captureNames,
    matcher,
    render: TemplateParser(body, captureNames, `${at}.body`)
  };
};

const compileMatcher = (
  mock: MockConfig,
  at: string
): {
  kind: MockPatternKind;
  pattern: string;
  matcher: CaptureMatcher;
  captureNames: string[];
  literalLength: number;
} => {
  if (mock.path !== undefined) {
    const path = mock.path;

    if (!path.startsWith('/')) {
      throw new ConfigValidationError(`${at}.path: must start with "/"`);
    }

    return {
      kind: 'exact',
      pattern: path,
      matcher: (pathname) => (pathname === path ? {} : null),
      captureNames: [],
      literalLength: path.length
    };
  }

  if (mock.template !== undefined) {
    return compileTemplateMatcher(mock.template, at);
  }

  return compileRegexMatcher(mock.pattern ?? '', at);
};

const compileTemplateMatcher = (template: string, at: string) => {
  if (!template.startsWith('/')) {
    throw new ConfigValidationError(`${at}.template: must start with "/"`);
  }

  let keys: Key[];
  let literalLength = 0;
  let matchFn: MatchFunction<Record<string, string | string[]>>;

  try {
    const tokens = parse(template);
    keys = tokens.filter((token): token is Key => typeof token !== 'string');
    tokens.forEach((token) => {
      literalLength += typeof token === 'string' ? token.length : token.prefix.length;
    });
    matchFn = match<Record<string, string | string[]>>(template);
  } catch (error) {
    throw new ConfigValidationError(
      `${at}.template: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const captureNames = keys.map((key) => String(key.name));

  return {
    kind: 'template' as const,
    pattern: template,
    matcher: (pathname: string) => {
      const result = matchFn(pathname);

      if (!result) {
        return null;
      }

      // optional parameters left out of the path render as empty strings
      const captures: Record<string, string> = {};

      captureNames.forEach((name) => {
        const value = result.params[name];

        captures[name] = Array.isArray(value) ? value.join('/') : value ?? '';
      });

      return captures;
    },
    captureNames,
    literalLength
  };
};

const compileRegexMatcher = (pattern: string, at: string) => {
  let regex: RegExp;

  if (pattern === '') {
    throw new ConfigValidationError(`${at}.pattern: must be a non-empty string`);
  }

  try {
    regex = new RegExp(`^(?:${pattern})$`);
  } catch (error) {
    throw new ConfigValidationError(
      `${at}.pattern: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // an alternation with the empty string always matches, exposing every group
  const probe = new RegExp(`${regex.source}|`).exec('');
  const groupCount = probe ? probe.length - 1 : 0;
  const namedGroups = Object.keys(probe?.groups ?? {});
  const numberedGroups = Array.from(
    { length: groupCount },
    (_value, groupIndex) => `$${groupIndex + 1}`
  );

  return {
    kind: 'regex' as const,
    pattern,
    matcher: (pathname: string) => {
      const result = regex.exec(pathname);

      if (!result) {
        return null;
      }

      const captures: Record<string, string> = {};

      result.forEach((value, groupIndex) => {
        if (groupIndex > 0) {
          captures[`$${groupIndex}`] = value ?? '';
        }
      });
      namedGroups.forEach((name) => {
        captures[name] = result.groups?.[name] ?? '';
      });

      return captures;
    },
    captureNames: [...numberedGroups, ...namedGroups],
    literalLength: 0
  };
};
