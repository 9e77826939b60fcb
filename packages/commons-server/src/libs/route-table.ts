import { ConfigValidationError, RouteConfig } from '../types/gateway-config';
import { IsValidBackendURL, joinUpstreamUrl } from './utils';

export type CompiledRoute = {
  name: string;
  backend: string;
  // declaration order, breaks specificity ties
  index: number;
} & (
  | { kind: 'prefix'; prefix: string }
  | { kind: 'regex'; pattern: string; regex: RegExp }
);

export type RouteMatch = {
  route: CompiledRoute;
  matchedPrefix: string;
  remainder: string;
  targetUrl: string;
};

/**
 * Path prefix to backend mappings.
 *
 * The longest matched prefix wins, ties go to the route declared first.
 * Prefixes match on segment boundaries ("/v1/models" does not match
 * "/v1/modelsx") unless they end with a slash.
 */
export class RouteTable {
  private constructor(private readonly routes: CompiledRoute[]) {}

  /**
   * Validate and compile route declarations.
   * Throws a ConfigValidationError listing every invalid route.
   *
   * @param routes
   * @param location - prefix used in issue messages
   */
  public static compile(
    routes: RouteConfig[],
    location = 'routes'
  ): RouteTable {
    const issues: string[] = [];
    const compiled: CompiledRoute[] = [];

    routes.forEach((route, index) => {
      const at = `${location}[${index}]`;
      const name = route.name ?? route.prefix ?? route.pattern ?? at;

      if (typeof route.backend !== 'string' || !IsValidBackendURL(route.backend)) {
        issues.push(
          `${at}.backend: must be an absolute http(s) URL without query or fragment`
        );
      }

      if (route.prefix !== undefined && route.pattern !== undefined) {
        issues.push(`${at}: set either "prefix" or "pattern", not both`);

        return;
      }

      if (route.prefix !== undefined) {
        if (typeof route.prefix !== 'string' || !route.prefix.startsWith('/')) {
          issues.push(`${at}.prefix: must be a string starting with "/"`);

          return;
        }

        compiled.push({
          name,
          backend: route.backend,
          index,
          kind: 'prefix',
          prefix: route.prefix
        });
      } else if (route.pattern !== undefined) {
        if (typeof route.pattern !== 'string' || route.pattern === '') {
          issues.push(`${at}.pattern: must be a non-empty string`);

          return;
        }

        try {
          compiled.push({
            name,
            backend: route.backend,
            index,
            kind: 'regex',
            pattern: route.pattern,
            regex: new RegExp(`^(?:${route.pattern})`)
          });
        } catch (error) {
          issues.push(
            `${at}.pattern: ${error instanceof Error ? error.message : String(error)}`
          );
        }
      } else {
        issues.push(`${at}: a route needs a "prefix" or a "pattern"`);
      }
    });

    if (issues.length > 0) {
      throw new ConfigValidationError(issues.join('; '), issues);
    }

    return new RouteTable(compiled);
  }

  public get size(): number {
    return this.routes.length;
  }

  public list(): readonly CompiledRoute[] {
    return this.routes;
  }

  /**
   * Find the most specific route for a pathname
   *
   * @param pathname
   * @param query - appended to the target URL as-is
   * @returns
   */
  public resolve(pathname: string, query = ''): RouteMatch | undefined {
    let best: { route: CompiledRoute; matchedPrefix: string } | undefined;

    for (const route of this.routes) {
      const matchedPrefix = this.matchPrefix(route, pathname);

      if (
        matchedPrefix !== null &&
        (!best || matchedPrefix.length > best.matchedPrefix.length)
      ) {
        best = { route, matchedPrefix };
      }
    }

    if (!best) {
      return undefined;
    }

    const remainder = pathname.slice(best.matchedPrefix.length);

    return {
      route: best.route,
      matchedPrefix: best.matchedPrefix,
      remainder,
      targetUrl: joinUpstreamUrl(best.route.backend, remainder + query)
    };
  }

  private matchPrefix(route: CompiledRoute, pathname: string): string | null {
    if (route.kind === 'regex') {
      const match = route.regex.exec(pathname);

      return match ? match[0] : null;
    }

    const { prefix } = route;

    if (
      pathname === prefix ||
      (prefix.endsWith('/') && pathname.startsWith(prefix)) ||
      pathname.startsWith(`${prefix}/`)
    ) {
      return prefix;
    }

    return null;
  }
}
