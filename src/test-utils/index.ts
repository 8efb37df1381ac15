export * from './factories.js';
export * from './mocks.js';
