import type { IncomingHttpHeaders, OutgoingHttpHeaders } from 'http';

/**
 * Remove duplicate slashes in the path part of an URL, leaving the query untouched
 *
 * @param url
 * @returns
 */
export const dedupSlashes = (url: string): string => {
  const { pathname, query } = splitRequestUrl(url);

  return pathname.replace(/\/{2,}/g, '/') + query;
};

/**
 * Split a request URL ("/path?query") into its pathname and its query
 * string (including the leading "?", or empty)
 *
 * @param url
 * @returns
 */
export const splitRequestUrl = (
  url: string
): { pathname: string; query: string } => {
  const queryIndex = url.indexOf('?');

  if (queryIndex === -1) {
    return { pathname: url || '/', query: '' };
  }

  return {
    pathname: url.slice(0, queryIndex) || '/',
    query: url.slice(queryIndex)
  };
};

/**
 * Append the remainder of a path (after the matched prefix) to a backend URL.
 * An empty remainder targets the backend URL itself.
 *
 * @param backend - absolute backend URL, without query
 * @param remainder - path remainder, may carry a query string
 * @returns
 */
export const joinUpstreamUrl = (backend: string, remainder: string): string => {
  const base = backend.replace(/\/+$/, '');

  if (remainder === '' || remainder.startsWith('?')) {
    return base + remainder;
  }

  return remainder.startsWith('/')
    ? base + remainder
    : `${base}/${remainder}`;
};

/**
 * Check that a string is an absolute http(s) URL usable as a backend
 * (no query string, no fragment)
 *
 * @param value
 * @returns
 */
export const IsValidBackendURL = (value: string): boolean => {
  let url: URL;

  try {
    url = new URL(value);
  } catch (_error) {
    return false;
  }

  return (
    (url.protocol === 'http:' || url.protocol === 'https:') &&
    url.search === '' &&
    url.hash === ''
  );
};

export const headersFromIncoming = (
  headers: IncomingHttpHeaders
): Record<string, string> =>
  Object.entries(headers).reduce<Record<string, string>>(function (
    acc,
    [key, value]
  ) {
    if (value === undefined) {
      return acc;
    }

    acc[key] = Array.isArray(value) ? value.join(',') : String(value);

    return acc;
  }, {});

export const headersFromOutgoing = (
  headers: OutgoingHttpHeaders
): Record<string, string> =>
  Object.entries(headers).reduce<Record<string, string>>(function (
    acc,
    [key, value]
  ) {
    if (value === undefined) {
      return acc;
    }

    acc[key] = Array.isArray(value) ? value.join(',') : String(value);

    return acc;
  }, {});

/**
 * Split an absolute URL into its origin ("http://host:port") and the path
 * with query that follows it ("/" when empty), keeping the path untouched
 *
 * @param url
 * @returns
 */
export const splitUpstreamUrl = (
  url: string
): { origin: string; path: string } => {
  const authorityStart = url.indexOf('://') + 3;
  const pathStart = url.slice(authorityStart).search(/[/?]/);

  if (pathStart === -1) {
    return { origin: url, path: '/' };
  }

  const origin = url.slice(0, authorityStart + pathStart);
  const path = url.slice(authorityStart + pathStart);

  return { origin, path: path.startsWith('?') ? `/${path}` : path };
};
