/**
 * Gatemock configuration types
 */

/**
 * Main configuration interface, as read from the JSON config file or
 * received by the admin API
 */
export interface GatewayConfig {
  version: string;
  defaultBackend?: string;
  routes?: RouteConfig[];
  mocks?: MockConfig[];
}

/**
 * Route forwarding a path prefix to a backend.
 * Exactly one of `prefix` or `pattern` (regex anchored at the path start) is set.
 */
export interface RouteConfig {
  name?: string;
  prefix?: string;
  pattern?: string;
  backend: string;
}

/**
 * Mock entry answering in place of the backends.
 * Exactly one of `path`, `template` or `pattern` is set.
 */
export interface MockConfig {
  name?: string;
  path?: string;
  template?: string; // e.g. "/v1/models/:namespace/:name"
  pattern?: string; // regex, anchored at both ends
  methods?: string[];
  priority?: number;
  statusCode?: number;
  contentType?: string;
  headers?: Record<string, string>;
  body?: unknown;
}

export type MockPatternKind = 'exact' | 'template' | 'regex';

/**
 * Validation errors
 */
export class ConfigValidationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.issues = issues.length > 0 ? issues : [message];
  }
}

/**
 * A mock body referencing a capture its pattern does not define,
 * or a body that is not a valid template
 */
export class MalformedMockTemplateError extends ConfigValidationError {
  constructor(message: string, issues: string[] = []) {
    super(message, issues);
    this.name = 'MalformedMockTemplateError';
  }
}
