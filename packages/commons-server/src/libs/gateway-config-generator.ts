import { GatewayConfig, RouteConfig } from '../types/gateway-config';

/**
 * Generates starter configurations
 */
export class GatewayConfigGenerator {
  /**
   * Configuration routing the platform microservices behind one gateway,
   * with a mock filling a model record the entity store lacks
   *
   * @param serviceHost - host suffix of the in-cluster services
   */
  public generateSample(serviceHost = 'svc.cluster.local'): GatewayConfig {
    const route = (
      name: string,
      service: string,
      port: number,
      path: string
    ): RouteConfig => ({
      name,
      prefix: path,
      backend: `http://${service}.${serviceHost}:${port}${path}`
    });

    return {
      version: '1.0',
      routes: [
        route('datasets', 'data-store', 3000, '/v1/datasets'),
        route('customization', 'customizer', 8000, '/v1/customization'),
        route('evaluation', 'evaluator', 7331, '/v1/evaluation'),
        route('guardrails', 'guardrails', 7331, '/v1/guardrail'),
        route('entity-store', 'entity-store', 8000, '/v1/entity-store'),
        route('models', 'entity-store', 8000, '/v1/models'),
        route('namespaces', 'entity-store', 8000, '/v1/namespaces'),
        route('datastore', 'data-store', 3000, '/v1/datastore'),
        route('huggingface-proxy', 'data-store', 3000, '/v1/hf'),
        route('git-lfs', 'data-store', 3000, '/v1/lfs')
      ],
      mocks: [
        {
          name: 'llama-3.2-1b-instruct',
          path: '/v1/models/meta/llama-3.2-1b-instruct',
          methods: ['GET'],
          statusCode: 200,
          contentType: 'application/json',
          body: {
            name: 'llama-3.2-1b-instruct',
            namespace: 'meta'
          }
        }
      ]
    };
  }
}
