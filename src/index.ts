// Public surface of the package.
export * from './models/jsonValue';
export * from './models/message';
export * from './models/capabilities';
export * from './services/errors';
export * from './services/logger';
export * from './services/interceptors';
export * from './services/metrics';
export * from './services/rateLimiter';
export * from './services/progressTracker';
export * from './services/catalogMirror';
export * from './server/transport';
export * from './server/memoryTransport';
export * from './server/correlator';
export * from './server/handshake';
export * from './server/registry';
export * from './server/client';
export * from './server/server';
export { getRuntimeConfig, loadRuntimeConfig, reloadRuntimeConfig, SUPPORTED_PROTOCOL_VERSIONS } from './config/runtimeConfig';
export type { RuntimeConfig, LogLevel, ImplementationConfig } from './config/runtimeConfig';
