export * from './lib/collection-name';
export * from './lib/errors';
export * from './lib/key-descriptor';
export * from './lib/key-utility';
export { logger } from './lib/logger';
export type { Logger } from './lib/logger';
export * from './lib/mongo-repo';
export * from './lib/query-stream';
export * from './lib/registration';
export * from './lib/repo';
export * from './lib/repository-options';
export * from './lib/startup';
export * from './lib/types';
