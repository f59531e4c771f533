export * from './provider-types.js';
export * from './google/google-provider.js';
export * from './google/models.js';
