export * from './search/index.js';
export * from './weather/index.js';
