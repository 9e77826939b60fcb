export * from './constants/server-messages.constants';
export * from './libs/logger';
export * from './libs/route-table';
export * from './libs/mock-responder';
export * from './libs/template-parser';
export * from './libs/server/admin-api';
export * from './libs/server/events-listeners';
export * from './libs/server/server';
export * from './libs/utils';

// Export config types and loaders
export { GatewayConfigGenerator } from './libs/gateway-config-generator';
export { GatewayConfigLoader } from './libs/gateway-config-loader';
export type { GatewaySnapshot } from './libs/gateway-config-loader';
export * from './types/gateway-config';
export * from './types/server.types';
