import { format } from 'util';
import type { Logger } from 'winston';
import { ServerMessages } from '../../constants/server-messages.constants';
import {
  ServerErrorCodes,
  ServerErrorPayload,
  Transaction
} from '../../types/server.types';
import { GatewayServer } from './server';

const authorizationHeaders = ['authorization', 'proxy-authorization'];

/**
 * Mask credentials, keeping the scheme ("Bearer ***")
 *
 * @param headers
 * @returns
 */
export const filterAuthorizationHeaders = (
  headers: Record<string, string>
): Record<string, string> =>
  Object.entries(headers).reduce<Record<string, string>>(
    (filtered, [key, value]) => {
      if (authorizationHeaders.includes(key.toLowerCase())) {
        const headerSplit = value.split(' ');

        filtered[key] =
          headerSplit.length === 1 ? '***' : `${headerSplit[0]} ***`;
      } else {
        filtered[key] = value;
      }

      return filtered;
    },
    {}
  );

export type ListenerOptions = {
  port: number;
  hostname?: string;
  // log request and response headers of each transaction
  logTransaction?: boolean;
};

/**
 * Forward the gateway events to a winston logger
 *
 * @param server
 * @param logger
 * @param options
 */
export const listenServerEvents = function (
  server: GatewayServer,
  logger: Logger,
  options: ListenerOptions
): void {
  const defaultLogMeta = {
    app: 'gatemock'
  };

  server.on('started', () => {
    logger.info(
      format(ServerMessages.SERVER_STARTED, server.address()?.port ?? options.port),
      { ...defaultLogMeta }
    );

    if (process.send) {
      process.send('ready');
    }
  });

  server.on('stopped', () => {
    logger.info(ServerMessages.SERVER_STOPPED, { ...defaultLogMeta });
  });

  server.on(
    'error',
    (
      errorCode: ServerErrorCodes,
      error: Error | null,
      payload?: ServerErrorPayload
    ) => {
      let message = '';

      switch (errorCode) {
        case ServerErrorCodes.PORT_ALREADY_USED:
        case ServerErrorCodes.PORT_INVALID:
          message = format(ServerMessages[errorCode], options.port);
          break;
        case ServerErrorCodes.HOSTNAME_UNKNOWN:
        case ServerErrorCodes.HOSTNAME_UNAVAILABLE:
          message = format(ServerMessages[errorCode], options.hostname);
          break;
        case ServerErrorCodes.PROXY_ERROR:
          message = format(
            ServerMessages[errorCode],
            payload?.targetUrl,
            error?.message ?? ''
          );
          break;
        case ServerErrorCodes.PROXY_TIMEOUT:
          message = error?.message ?? ServerMessages.BACKEND_TIMEOUT;
          break;
        case ServerErrorCodes.MOCK_RENDER_ERROR:
          message = format(
            ServerMessages[errorCode],
            payload?.mockName ?? payload?.path,
            error?.message ?? ''
          );
          break;
        case ServerErrorCodes.UNKNOWN_SERVER_ERROR:
        case ServerErrorCodes.REQUEST_HANDLING_ERROR:
          message = format(ServerMessages[errorCode], error?.message ?? '');
          break;
      }

      logger.error(message, { ...defaultLogMeta, errorCode, ...payload });
    }
  );

  server.on('mock-served', (event) => {
    logger.debug('Mock served', {
      ...defaultLogMeta,
      mockName: event.mockName,
      requestMethod: event.method,
      requestPath: event.path,
      responseStatus: event.statusCode,
      captures: event.captures
    });
  });

  server.on('proxy-log', (entry) => {
    logger.log(entry.level, 'Proxy request processed', {
      ...defaultLogMeta,
      proxy: {
        id: entry.id,
        route: entry.routeName,
        targetUrl: entry.targetUrl,
        durationMs: entry.durationMs,
        requestMethod: entry.method,
        status: entry.status,
        error: entry.error,
        timedOut: entry.timedOut,
        cancelled: entry.cancelled
      }
    });
  });

  server.on('transaction-complete', (transaction: Transaction) => {
    const logMeta: Record<string, unknown> = {
      ...defaultLogMeta,
      requestMethod: transaction.method,
      requestPath: transaction.path,
      responseStatus: transaction.statusCode,
      dispatch: transaction.dispatch,
      revision: transaction.revision,
      targetUrl: transaction.targetUrl,
      durationMs: transaction.durationMs
    };

    if (options.logTransaction) {
      logMeta.transaction = {
        ...transaction,
        requestHeaders: filterAuthorizationHeaders(transaction.requestHeaders),
        responseHeaders: filterAuthorizationHeaders(transaction.responseHeaders)
      };
    }

    logger.info('Transaction recorded', logMeta);
  });

  server.on('config-reloaded', (summary) => {
    logger.info(
      format(
        ServerMessages.CONFIG_RELOADED,
        summary.version,
        summary.source,
        summary.revision,
        summary.routes,
        summary.mocks
      ),
      { ...defaultLogMeta }
    );
  });

  server.on('config-reload-rejected', (source, issues) => {
    logger.error(format(ServerMessages.CONFIG_RELOAD_REJECTED, source), {
      ...defaultLogMeta,
      issues
    });
  });
};
