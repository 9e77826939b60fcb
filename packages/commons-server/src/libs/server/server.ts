import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import express, { NextFunction, Request, Response } from 'express';
import {
  createServer as httpCreateServer,
  Server as httpServer
} from 'http';
import type {
  ClientRequest,
  IncomingMessage,
  RequestListener,
  ServerResponse
} from 'http';
import {
  createProxyMiddleware,
  debugProxyErrorsPlugin,
  proxyEventsPlugin
} from 'http-proxy-middleware';
import { AddressInfo, Socket } from 'net';
import type TypedEmitter from 'typed-emitter';
import { format } from 'util';
import { ServerMessages } from '../../constants/server-messages.constants';
import { ConfigValidationError } from '../../types/gateway-config';
import {
  DispatchKind,
  ProxyLogEntry,
  ReloadSummary,
  ServerErrorCodes,
  ServerEvents,
  ServerOptions,
  Transaction,
  defaultAdminPrefix,
  defaultMaxTransactionLogs,
  defaultUpstreamTimeout
} from '../../types/server.types';
import { GatewayConfigLoader, GatewaySnapshot } from '../gateway-config-loader';
import { MockResult } from '../mock-responder';
import {
  dedupSlashes,
  headersFromIncoming,
  headersFromOutgoing,
  joinUpstreamUrl,
  splitRequestUrl,
  splitUpstreamUrl
} from '../utils';
import { createAdminEndpoint } from './admin-api';

/**
 * Resolution of one request against the snapshot active when it arrived
 */
type DispatchState = {
  startedAt: number;
  snapshot: GatewaySnapshot;
  pathname: string;
  query: string;
  kind: DispatchKind;
  mock?: Extract<MockResult, { matched: true }>;
  routeName?: string;
  targetUrl?: string;
  timedOut?: boolean;
  cancelled?: boolean;
};

export type ReloadResult =
  | { success: true; summary: ReloadSummary }
  | { success: false; error: string; issues: string[] };

/**
 * Create a gateway server reading its route and mock tables from a config loader.
 *
 * Extends EventEmitter.
 */
export class GatewayServer extends (EventEmitter as new () => TypedEmitter<ServerEvents>) {
  private serverInstance: httpServer | null = null;
  private options: ServerOptions = {
    port: 8080,
    enableAdminApi: true,
    adminPrefix: defaultAdminPrefix,
    upstreamTimeout: defaultUpstreamTimeout,
    maxTransactionLogs: defaultMaxTransactionLogs
  };
  private transactionLogs: Transaction[] = [];
  private dispatchStates = new WeakMap<IncomingMessage, DispatchState>();

  constructor(
    private configLoader: GatewayConfigLoader,
    options: Partial<ServerOptions> = {}
  ) {
    super();

    this.options = {
      ...this.options,
      ...options
    };
  }

  /**
   * Start a server
   */
  public start(): void {
    this.serverInstance = httpCreateServer(this.createRequestListener());

    // handle server errors
    this.serverInstance.on('error', (error: NodeJS.ErrnoException) => {
      let errorCode: ServerErrorCodes;

      switch (error.code) {
        case 'EADDRINUSE':
          errorCode = ServerErrorCodes.PORT_ALREADY_USED;
          break;
        case 'EACCES':
        case 'ERR_SOCKET_BAD_PORT':
          errorCode = ServerErrorCodes.PORT_INVALID;
          break;
        case 'EADDRNOTAVAIL':
          errorCode = ServerErrorCodes.HOSTNAME_UNAVAILABLE;
          break;
        case 'ENOTFOUND':
          errorCode = ServerErrorCodes.HOSTNAME_UNKNOWN;
          break;
        default:
          errorCode = ServerErrorCodes.UNKNOWN_SERVER_ERROR;
      }
      this.emit('error', errorCode, error);
    });

    try {
      this.serverInstance.listen(
        { port: this.options.port, host: this.options.hostname },
        () => {
          this.emit('started');
        }
      );
    } catch (error) {
      this.emit(
        'error',
        ServerErrorCodes.PORT_INVALID,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Stop the server, closing idle and active connections
   */
  public stop(): void {
    if (!this.serverInstance) {
      return;
    }

    const serverInstance = this.serverInstance;
    this.serverInstance = null;

    serverInstance.close(() => {
      this.emit('stopped');
    });
    serverInstance.closeAllConnections();
  }

  /**
   * Address the server listens on, once started
   */
  public address(): AddressInfo | null {
    const address = this.serverInstance?.address();

    return address && typeof address === 'object' ? address : null;
  }

  public getTransactionLogs(): Transaction[] {
    return this.transactionLogs;
  }

  public purgeTransactionLogs(): void {
    this.transactionLogs = [];
  }

  /**
   * Reload the tables from the config file (or another one).
   * A rejected configuration leaves the active tables untouched.
   *
   * @param configPath
   */
  public reloadConfig(configPath?: string): ReloadResult {
    return this.swapTables(
      () => this.configLoader.reload(configPath),
      configPath ?? this.configLoader.getConfigPath() ?? 'config file'
    );
  }

  /**
   * Replace the tables with an already parsed configuration
   *
   * @param content
   * @param source
   */
  public applyConfig(content: unknown, source: string): ReloadResult {
    return this.swapTables(
      () => this.configLoader.applyConfig(content, source),
      source
    );
  }

  /**
   * Create a request listener
   */
  public createRequestListener(): RequestListener {
    const app = express();
    app.disable('x-powered-by');
    app.disable('etag');

    app.use(this.emitEvent);
    app.use(this.deduplicateRequestSlashes);
    app.use(this.resolveDispatch);
    app.use(this.logRequest);

    if (this.options.enableAdminApi) {
      // admin endpoint must be created before the mocks and the proxy
      createAdminEndpoint(app, {
        prefix: this.options.adminPrefix,
        getSnapshot: () => this.configLoader.getSnapshot(),
        applyConfig: (content, source) => this.applyConfig(content, source),
        reloadConfig: (configPath) => this.reloadConfig(configPath),
        getLogs: () => this.getTransactionLogs(),
        purgeLogs: () => this.purgeTransactionLogs()
      });
    }

    app.use(this.serveMock);
    this.enableProxy(app);
    app.use(this.notFound);
    app.use(this.errorHandler);

    return app;
  }

  /**
   * ### Middleware ###
   * Emit the entering-request event
   *
   * @param request
   * @param response
   * @param next
   */
  private emitEvent = (
    request: Request,
    response: Response,
    next: NextFunction
  ) => {
    this.emit('entering-request');
    next();
  };

  /**
   * ### Middleware ###
   * Remove duplicate slashes in entering call paths
   *
   * @param request
   * @param response
   * @param next
   */
  private deduplicateRequestSlashes(
    request: Request,
    response: Response,
    next: NextFunction
  ) {
    request.url = dedupSlashes(request.url);

    next();
  }

  /**
   * ### Middleware ###
   * Read the active snapshot once and decide how the request is answered:
   * mocks first, then the route table, then the default backend
   *
   * @param request
   * @param response
   * @param next
   */
  private resolveDispatch = (
    request: Request,
    response: Response,
    next: NextFunction
  ) => {
    const snapshot = this.configLoader.getSnapshot();
    const { pathname, query } = splitRequestUrl(request.url);
    const state: DispatchState = {
      startedAt: Date.now(),
      snapshot,
      pathname,
      query,
      kind: 'not-found'
    };
    this.dispatchStates.set(request, state);

    if (this.options.enableAdminApi && this.isAdminPath(pathname)) {
      state.kind = 'admin';
      next();

      return;
    }

    let mockResult: MockResult;

    try {
      mockResult = snapshot.mocks.respond(pathname, request.method);
    } catch (error) {
      this.emit(
        'error',
        ServerErrorCodes.MOCK_RENDER_ERROR,
        error instanceof Error ? error : new Error(String(error)),
        { method: request.method, path: pathname }
      );
      next(error);

      return;
    }

    if (mockResult.matched) {
      state.kind = 'mock';
      state.mock = mockResult;
    } else {
      const routeMatch = snapshot.routes.resolve(pathname, query);

      if (routeMatch) {
        state.kind = 'route';
        state.routeName = routeMatch.route.name;
        state.targetUrl = routeMatch.targetUrl;
      } else if (snapshot.defaultBackend) {
        state.kind = 'default';
        state.routeName = 'default';
        state.targetUrl = joinUpstreamUrl(
          snapshot.defaultBackend,
          pathname + query
        );
      }
    }

    next();
  };

  /**
   * ### Middleware ###
   * Record the transaction when the response emits the 'close' event
   *
   * @param request
   * @param response
   * @param next
   */
  private logRequest = (
    request: Request,
    response: Response,
    next: NextFunction
  ) => {
    response.on('close', () => {
      const transaction = this.createTransaction(request, response);

      this.emit('transaction-complete', transaction);

      // store the transaction logs at beginning of the array
      this.transactionLogs.unshift(transaction);

      // keep only the last n transactions
      if (this.transactionLogs.length > this.options.maxTransactionLogs) {
        this.transactionLogs = this.transactionLogs.slice(
          0,
          this.options.maxTransactionLogs
        );
      }
    });

    next();
  };

  /**
   * ### Middleware ###
   * Answer with the matched mock entry, no backend involved
   *
   * @param request
   * @param response
   * @param next
   */
  private serveMock = (
    request: Request,
    response: Response,
    next: NextFunction
  ) => {
    const state = this.dispatchStates.get(request);

    if (!state?.mock) {
      next();

      return;
    }

    const { mock } = state;

    response.status(mock.statusCode);
    // set through the node API: express would append a charset
    response.setHeader('Content-Type', mock.contentType);
    Object.entries(mock.headers).forEach(([key, value]) => {
      response.setHeader(key, value);
    });

    this.emit('mock-served', {
      method: request.method,
      path: state.pathname,
      mockName: mock.entry.name,
      statusCode: mock.statusCode,
      captures: mock.captures
    });

    response.send(Buffer.from(mock.body, 'utf-8'));
  };

  /**
   * Forward routed requests to their backend.
   * The body is streamed to the backend as received, and the backend
   * response is streamed back as-is.
   *
   * @param server - server on which to launch the proxy
   */
  private enableProxy(server: express.Application) {
    server.use(
      createProxyMiddleware({
        changeOrigin: true,
        // the default error response plugin would answer before our handler
        ejectPlugins: true,
        plugins: [debugProxyErrorsPlugin, proxyEventsPlugin],
        pathFilter: (_path, request) => {
          const kind = this.dispatchStates.get(request)?.kind;

          return kind === 'route' || kind === 'default';
        },
        router: (request) =>
          splitUpstreamUrl(this.getTargetUrl(request)).origin,
        pathRewrite: (_path, request) =>
          splitUpstreamUrl(this.getTargetUrl(request)).path,
        on: {
          proxyReq: (proxyReq, request, response) => {
            this.watchProxyRequest(proxyReq, request, response);
          },
          proxyRes: (proxyRes, request, response) => {
            const state = this.dispatchStates.get(request);

            // a backend that dies mid-body must not end the client response cleanly
            proxyRes.on('close', () => {
              if (!proxyRes.complete && !response.writableEnded) {
                response.destroy();
              }
            });

            proxyRes.on('end', () => {
              this.emitProxyLog({
                level: this.determineProxyLogLevel(proxyRes.statusCode),
                routeName: state?.routeName,
                targetUrl: state?.targetUrl ?? '',
                method: request.method ?? 'GET',
                durationMs: state ? Date.now() - state.startedAt : undefined,
                status: proxyRes.statusCode
              });
            });
          },
          error: (error, request, response) => {
            this.handleProxyError(error, request, response);
          }
        }
      })
    );
  }

  /**
   * Bound the backend call duration and cancel it when the client goes away
   *
   * @param proxyReq
   * @param request
   * @param response
   */
  private watchProxyRequest(
    proxyReq: ClientRequest,
    request: IncomingMessage,
    response: ServerResponse
  ) {
    const state = this.dispatchStates.get(request);

    proxyReq.setTimeout(this.options.upstreamTimeout, () => {
      if (proxyReq.destroyed || response.writableFinished) {
        return;
      }

      if (state) {
        state.timedOut = true;
      }

      const error = new Error(
        format(
          ServerMessages.PROXY_TIMEOUT,
          state?.targetUrl ?? '',
          this.options.upstreamTimeout
        )
      );

      // the status line is already out: abort the client response
      if (response.headersSent) {
        this.handleProxyError(error, request, response);
        proxyReq.destroy();

        return;
      }

      proxyReq.destroy(error);
    });

    response.on('close', () => {
      if (!state || response.writableFinished) {
        return;
      }

      if (state.timedOut || state.cancelled) {
        return;
      }

      state.cancelled = true;
      this.emitProxyLog({
        level: 'info',
        routeName: state.routeName,
        targetUrl: state.targetUrl ?? '',
        method: request.method ?? 'GET',
        durationMs: Date.now() - state.startedAt,
        cancelled: true
      });

      if (!proxyReq.destroyed) {
        proxyReq.destroy();
      }
    });
  }

  /**
   * Answer 502 on connection failures, 504 on timeouts.
   * Nothing is retried.
   *
   * @param error
   * @param request
   * @param response
   */
  private handleProxyError(
    error: Error,
    request: IncomingMessage,
    response: ServerResponse | Socket
  ) {
    const state = this.dispatchStates.get(request);
    const targetUrl = state?.targetUrl ?? '';
    const method = request.method ?? 'GET';
    const durationMs = state ? Date.now() - state.startedAt : undefined;

    // already logged when the client went away
    if (state?.cancelled) {
      return;
    }

    const timedOut = state?.timedOut === true;

    this.emitProxyLog({
      level: 'error',
      routeName: state?.routeName,
      targetUrl,
      method,
      durationMs,
      error: error.message,
      timedOut
    });

    this.emit(
      'error',
      timedOut ? ServerErrorCodes.PROXY_TIMEOUT : ServerErrorCodes.PROXY_ERROR,
      error,
      { method, path: state?.pathname, targetUrl }
    );

    if (response instanceof Socket) {
      response.destroy();

      return;
    }

    // part of the backend response already reached the client
    if (response.headersSent) {
      response.destroy();

      return;
    }

    this.sendError(
      response,
      format(
        timedOut
          ? ServerMessages.BACKEND_TIMEOUT
          : ServerMessages.BACKEND_UNREACHABLE,
        targetUrl
      ),
      timedOut ? 504 : 502
    );
  }

  /**
   * ### Middleware ###
   * Nothing matched the request path
   *
   * @param request
   * @param response
   */
  private notFound = (request: Request, response: Response) => {
    const state = this.dispatchStates.get(request);

    this.sendError(
      response,
      format(
        ServerMessages.NOT_FOUND,
        request.method,
        state?.pathname ?? request.path
      ),
      404
    );
  };

  /**
   * ### Middleware ###
   * Catch all error handler
   * http://expressjs.com/en/guide/error-handling.html#catching-errors
   *
   * @param error
   * @param request
   * @param response
   * @param _next
   */
  private errorHandler = (
    error: unknown,
    request: Request,
    response: Response,
    _next: NextFunction
  ) => {
    const normalizedError =
      error instanceof Error ? error : new Error(String(error));

    this.emit('error', ServerErrorCodes.REQUEST_HANDLING_ERROR, normalizedError, {
      method: request.method,
      path: request.path
    });

    if (response.headersSent) {
      response.destroy();

      return;
    }

    this.sendError(response, normalizedError, 500);
  };

  private swapTables(
    load: () => GatewaySnapshot,
    source: string
  ): ReloadResult {
    try {
      const snapshot = load();
      const summary: ReloadSummary = {
        revision: snapshot.revision,
        version: snapshot.version,
        source: snapshot.source,
        routes: snapshot.routes.size,
        mocks: snapshot.mocks.size
      };

      this.emit('config-reloaded', summary);

      return { success: true, summary };
    } catch (error) {
      const issues =
        error instanceof ConfigValidationError
          ? error.issues
          : [error instanceof Error ? error.message : String(error)];

      this.emit('config-reload-rejected', source, issues);

      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
        issues
      };
    }
  }

  private isAdminPath(pathname: string): boolean {
    const prefix = this.options.adminPrefix;

    return pathname === prefix || pathname.startsWith(`${prefix}/`);
  }

  private getTargetUrl(request: IncomingMessage): string {
    const targetUrl = this.dispatchStates.get(request)?.targetUrl;

    if (!targetUrl) {
      throw new Error(`No backend resolved for ${request.url ?? ''}`);
    }

    return targetUrl;
  }

  private createTransaction(request: Request, response: Response): Transaction {
    const state = this.dispatchStates.get(request);

    return {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      method: request.method.toUpperCase(),
      path: state?.pathname ?? request.path,
      query: state?.query ?? '',
      statusCode: response.statusCode,
      dispatch: state?.kind ?? 'not-found',
      revision: state?.snapshot.revision,
      targetUrl: state?.targetUrl,
      mockName: state?.mock?.entry.name,
      durationMs: state ? Date.now() - state.startedAt : 0,
      requestHeaders: headersFromIncoming(request.headers),
      responseHeaders: headersFromOutgoing(response.getHeaders())
    };
  }

  private determineProxyLogLevel(status?: number): 'info' | 'warn' | 'error' {
    if (status === undefined) {
      return 'info';
    }

    if (status >= 500) {
      return 'error';
    }

    if (status >= 400) {
      return 'warn';
    }

    return 'info';
  }

  private emitProxyLog(entry: Omit<ProxyLogEntry, 'id' | 'timestamp'>) {
    this.emit('proxy-log', {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry
    });
  }

  /**
   * Send an error with text/plain content type, the provided message and status code.
   *
   * @param response
   * @param errorMessage
   * @param status
   */
  private sendError(
    response: ServerResponse,
    errorMessage: string | Error,
    status: number
  ) {
    const message =
      errorMessage instanceof Error ? errorMessage.message : errorMessage;

    response.statusCode = status;
    response.setHeader('Content-Type', 'text/plain');
    response.setHeader('Content-Length', Buffer.byteLength(message));
    response.end(message);
  }
}
