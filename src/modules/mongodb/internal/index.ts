// Re-export thin, typed internals for clean imports.
export * from './mongodb.types';
export { LazyMongoClient } from './mongodb.client';
