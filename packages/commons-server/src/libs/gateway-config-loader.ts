import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import {
  ConfigValidationError,
  GatewayConfig,
  MockConfig,
  RouteConfig
} from '../types/gateway-config';
import { MockResponder } from './mock-responder';
import { RouteTable } from './route-table';
import { IsValidBackendURL } from './utils';

/**
 * Immutable, compiled view of a configuration.
 * A request reads exactly one snapshot from start to end.
 */
export type GatewaySnapshot = {
  readonly revision: number;
  readonly version: string;
  readonly source: string;
  readonly loadedAt: string;
  readonly config: GatewayConfig;
  readonly routes: RouteTable;
  readonly mocks: MockResponder;
  readonly defaultBackend?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readString = (
  record: Record<string, unknown>,
  key: string,
  at: string,
  issues: string[]
): string | undefined => {
  const field = record[key];

  if (field === undefined) {
    return undefined;
  }
  if (typeof field !== 'string') {
    issues.push(`${at}.${key}: must be a string`);

    return undefined;
  }

  return field;
};

const readInteger = (
  record: Record<string, unknown>,
  key: string,
  at: string,
  issues: string[]
): number | undefined => {
  const field = record[key];

  if (field === undefined) {
    return undefined;
  }
  if (typeof field !== 'number' || !Number.isInteger(field)) {
    issues.push(`${at}.${key}: must be an integer`);

    return undefined;
  }

  return field;
};

/**
 * Loads the gateway configuration and holds the active snapshot.
 *
 * Loading is all-or-nothing: the configuration is fully validated and
 * compiled before the active snapshot reference is replaced, so a rejected
 * configuration leaves the previous tables in place.
 */
export class GatewayConfigLoader {
  private snapshot: GatewaySnapshot | null = null;
  private configPath: string | null = null;
  private revision = 0;

  /**
   * Load configuration from file
   * @param configPath Path to config file (absolute or relative to cwd)
   */
  public loadConfig(configPath: string): GatewaySnapshot {
    const resolvedPath = resolve(process.cwd(), configPath);

    if (!existsSync(resolvedPath)) {
      throw new ConfigValidationError(`Config file not found: ${resolvedPath}`);
    }

    let content: unknown;

    try {
      content = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConfigValidationError(
          `Invalid JSON in config file: ${error.message}`
        );
      }
      throw error;
    }

    const snapshot = this.applyConfig(content, resolvedPath);
    this.configPath = resolvedPath;

    return snapshot;
  }

  /**
   * Reload from the last loaded file, or from another one
   * @param configPath Optional new config file location
   */
  public reload(configPath?: string): GatewaySnapshot {
    const path = configPath ?? this.configPath;

    if (!path) {
      throw new ConfigValidationError(
        'No config file to reload from, provide a path'
      );
    }

    return this.loadConfig(path);
  }

  /**
   * Validate, compile and activate an already parsed configuration
   * @param content Parsed JSON content
   * @param source Where the content comes from, for logs and the admin API
   */
  public applyConfig(content: unknown, source: string): GatewaySnapshot {
    const config = this.validateConfig(content);
    const issues: string[] = [];
    let routes: RouteTable | undefined;
    let mocks: MockResponder | undefined;

    try {
      routes = RouteTable.compile(config.routes ?? []);
    } catch (error) {
      if (!(error instanceof ConfigValidationError)) {
        throw error;
      }
      issues.push(...error.issues);
    }

    try {
      mocks = MockResponder.compile(config.mocks ?? []);
    } catch (error) {
      if (!(error instanceof ConfigValidationError)) {
        throw error;
      }
      // a mock template error alone keeps its type for the caller
      if (issues.length === 0) {
        throw error;
      }
      issues.push(...error.issues);
    }

    if (!routes || !mocks || issues.length > 0) {
      throw new ConfigValidationError(issues.join('; '), issues);
    }

    this.revision += 1;
    this.snapshot = Object.freeze({
      revision: this.revision,
      version: config.version,
      source,
      loadedAt: new Date().toISOString(),
      config,
      routes,
      mocks,
      defaultBackend: config.defaultBackend
    });

    return this.snapshot;
  }

  /**
   * Check if config is loaded
   */
  public isLoaded(): boolean {
    return this.snapshot !== null;
  }

  /**
   * Get the active snapshot
   */
  public getSnapshot(): GatewaySnapshot {
    if (!this.snapshot) {
      throw new ConfigValidationError('No config loaded');
    }

    return this.snapshot;
  }

  public getConfigPath(): string | null {
    return this.configPath;
  }

  /**
   * Validate the shape of a parsed configuration
   */
  private validateConfig(content: unknown): GatewayConfig {
    if (!isRecord(content)) {
      throw new ConfigValidationError('Config must be a JSON object');
    }

    const issues: string[] = [];

    // Version is required
    if (typeof content.version !== 'string' || content.version.trim() === '') {
      issues.push('version: config must have a version field');
    }

    if (
      content.defaultBackend !== undefined &&
      (typeof content.defaultBackend !== 'string' ||
        !IsValidBackendURL(content.defaultBackend))
    ) {
      issues.push(
        'defaultBackend: must be an absolute http(s) URL without query or fragment'
      );
    }

    const routes = this.validateRoutes(content.routes, issues);
    const mocks = this.validateMocks(content.mocks, issues);

    if (issues.length > 0 || typeof content.version !== 'string') {
      throw new ConfigValidationError(issues.join('; '), issues);
    }

    return {
      version: content.version,
      defaultBackend:
        typeof content.defaultBackend === 'string'
          ? content.defaultBackend
          : undefined,
      routes,
      mocks
    };
  }

  private validateRoutes(value: unknown, issues: string[]): RouteConfig[] {
    if (value === undefined) {
      return [];
    }

    if (!Array.isArray(value)) {
      issues.push('routes: must be an array');

      return [];
    }

    return value.flatMap((route: unknown, index): RouteConfig[] => {
      const at = `routes[${index}]`;

      if (!isRecord(route)) {
        issues.push(`${at}: must be an object`);

        return [];
      }

      const initialIssues = issues.length;
      const config: RouteConfig = {
        name: readString(route, 'name', at, issues),
        prefix: readString(route, 'prefix', at, issues),
        pattern: readString(route, 'pattern', at, issues),
        backend: readString(route, 'backend', at, issues) ?? ''
      };

      if (route.backend === undefined) {
        issues.push(`${at}.backend: is required`);
      }

      return issues.length > initialIssues ? [] : [config];
    });
  }

  private validateMocks(value: unknown, issues: string[]): MockConfig[] {
    if (value === undefined) {
      return [];
    }

    if (!Array.isArray(value)) {
      issues.push('mocks: must be an array');

      return [];
    }

    return value.flatMap((mock: unknown, index): MockConfig[] => {
      const at = `mocks[${index}]`;

      if (!isRecord(mock)) {
        issues.push(`${at}: must be an object`);

        return [];
      }

      const initialIssues = issues.length;
      const config: MockConfig = {
        name: readString(mock, 'name', at, issues),
        path: readString(mock, 'path', at, issues),
        template: readString(mock, 'template', at, issues),
        pattern: readString(mock, 'pattern', at, issues),
        contentType: readString(mock, 'contentType', at, issues),
        statusCode: readInteger(mock, 'statusCode', at, issues),
        priority: readInteger(mock, 'priority', at, issues),
        methods: this.readStringArray(mock.methods, `${at}.methods`, issues),
        headers: this.readStringRecord(mock.headers, `${at}.headers`, issues),
        body: mock.body
      };

      return issues.length > initialIssues ? [] : [config];
    });
  }

  private readStringArray(
    value: unknown,
    at: string,
    issues: string[]
  ): string[] | undefined {
    if (value === undefined) {
      return undefined;
    }

    if (
      !Array.isArray(value) ||
      !value.every((item): item is string => typeof item === 'string')
    ) {
      issues.push(`${at}: must be an array of strings`);

      return undefined;
    }

    return value;
  }

  private readStringRecord(
    value: unknown,
    at: string,
    issues: string[]
  ): Record<string, string> | undefined {
    if (value === undefined) {
      return undefined;
    }

    if (!isRecord(value)) {
      issues.push(`${at}: must be an object of strings`);

      return undefined;
    }

    const record: Record<string, string> = {};

    for (const [key, field] of Object.entries(value)) {
      if (typeof field !== 'string') {
        issues.push(`${at}.${key}: must be a string`);

        return undefined;
      }
      record[key] = field;
    }

    return record;
  }
}
