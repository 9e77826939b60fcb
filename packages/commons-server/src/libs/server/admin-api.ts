import express, {
  Application,
  NextFunction,
  Request,
  Response,
  Router
} from 'express';
import type { Transaction } from '../../types/server.types';
import type { GatewaySnapshot } from '../gateway-config-loader';
import type { ReloadResult } from './server';

export type AdminEndpointCallbacks = {
  prefix: string;
  getSnapshot: () => GatewaySnapshot;
  applyConfig: (content: unknown, source: string) => ReloadResult;
  reloadConfig: (configPath?: string) => ReloadResult;
  getLogs: () => Transaction[];
  purgeLogs: () => void;
};

const sendReloadResult = (response: Response, result: ReloadResult) => {
  if (result.success) {
    const { revision, version, routes, mocks } = result.summary;

    response.status(200).json({ revision, version, routes, mocks });
  } else {
    response.status(400).json({ error: result.error, issues: result.issues });
  }
};

/**
 * Create the admin endpoints used to inspect and swap the route and mock
 * tables without restarting the gateway
 *
 * @param app
 * @param callbacks
 */
export const createAdminEndpoint = (
  app: Application,
  callbacks: AdminEndpointCallbacks
): void => {
  const router = Router();

  router.use(express.json({ limit: '5mb' }));

  router.get('/health', (request, response) => {
    const snapshot = callbacks.getSnapshot();

    response.json({
      status: 'ok',
      revision: snapshot.revision,
      version: snapshot.version
    });
  });

  router.get('/config', (request, response) => {
    const snapshot = callbacks.getSnapshot();

    response.json({
      revision: snapshot.revision,
      version: snapshot.version,
      source: snapshot.source,
      loadedAt: snapshot.loadedAt,
      config: snapshot.config
    });
  });

  router.put('/config', (request, response) => {
    sendReloadResult(
      response,
      callbacks.applyConfig(request.body, `admin-api ${request.ip ?? ''}`.trim())
    );
  });

  router.post('/reload', (request, response) => {
    const configPath: unknown = request.body?.path;

    if (configPath !== undefined && typeof configPath !== 'string') {
      response.status(400).json({
        error: 'path must be a string',
        issues: ['path: must be a string']
      });

      return;
    }

    sendReloadResult(response, callbacks.reloadConfig(configPath));
  });

  router.get('/logs', (request, response) => {
    response.json(callbacks.getLogs());
  });

  router.delete('/logs', (request, response) => {
    callbacks.purgeLogs();
    response.status(204).end();
  });

  // body parsing errors
  router.use(
    (error: unknown, request: Request, response: Response, next: NextFunction) => {
      if (response.headersSent) {
        next(error);

        return;
      }

      const message = error instanceof Error ? error.message : String(error);

      response.status(400).json({ error: message, issues: [message] });
    }
  );

  app.use(callbacks.prefix, router);
};
