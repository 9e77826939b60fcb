export const defaultMaxTransactionLogs = 100;
export const defaultUpstreamTimeout = 30_000;
export const defaultAdminPrefix = '/gateway-admin';

export type ServerOptions = {
  port: number;
  hostname?: string;
  enableAdminApi: boolean;
  adminPrefix: string;
  // backend request timeout, in ms
  upstreamTimeout: number;
  maxTransactionLogs: number;
};

export enum ServerErrorCodes {
  PORT_ALREADY_USED = 'PORT_ALREADY_USED',
  PORT_INVALID = 'PORT_INVALID',
  HOSTNAME_UNAVAILABLE = 'HOSTNAME_UNAVAILABLE',
  HOSTNAME_UNKNOWN = 'HOSTNAME_UNKNOWN',
  UNKNOWN_SERVER_ERROR = 'UNKNOWN_SERVER_ERROR',
  PROXY_ERROR = 'PROXY_ERROR',
  PROXY_TIMEOUT = 'PROXY_TIMEOUT',
  MOCK_RENDER_ERROR = 'MOCK_RENDER_ERROR',
  REQUEST_HANDLING_ERROR = 'REQUEST_HANDLING_ERROR'
}

export type ServerErrorPayload = {
  method?: string;
  path?: string;
  targetUrl?: string;
  mockName?: string;
};

/**
 * How a request was answered
 */
export type DispatchKind = 'mock' | 'route' | 'default' | 'not-found' | 'admin';

export type Transaction = {
  id: string;
  timestamp: string;
  method: string;
  path: string;
  query: string;
  statusCode: number;
  dispatch: DispatchKind;
  revision?: number;
  targetUrl?: string;
  mockName?: string;
  durationMs: number;
  requestHeaders: Record<string, string>;
  responseHeaders: Record<string, string>;
};

export type ProxyLogEntry = {
  id: string;
  timestamp: string;
  level: 'info' | 'warn' | 'error';
  routeName?: string;
  targetUrl: string;
  method: string;
  durationMs?: number;
  status?: number;
  error?: string;
  cancelled?: boolean;
  timedOut?: boolean;
};

export type MockServedEvent = {
  method: string;
  path: string;
  mockName: string;
  statusCode: number;
  captures: Record<string, string>;
};

export type ReloadSummary = {
  revision: number;
  version: string;
  source: string;
  routes: number;
  mocks: number;
};

export type ServerEvents = {
  'started': () => void;
  'stopped': () => void;
  'error': (
    errorCode: ServerErrorCodes,
    error: Error | null,
    payload?: ServerErrorPayload
  ) => void;
  'entering-request': () => void;
  'mock-served': (event: MockServedEvent) => void;
  'proxy-log': (entry: ProxyLogEntry) => void;
  'transaction-complete': (transaction: Transaction) => void;
  'config-reloaded': (summary: ReloadSummary) => void;
  'config-reload-rejected': (source: string, issues: string[]) => void;
};
