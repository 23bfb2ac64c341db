export * from './client.js';
export * from './configuration.js';
export * from './request.js';
export * from './response.js';
export * from './interceptor.js';
export * from './stream.js';
export * from './types.js';

export * from './instrumentation.js';

export * from './security/certificates.js';
export * from './security/connector.js';
export * from './security/trust-aggregator.js';
export * from './security/trust-delegate.js';
export * from './security/trust-store.js';

// Export pure functional core functions
export * from './core/http-utils.js';
export * from './core/types.js';
