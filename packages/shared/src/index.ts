export const name = '@snakify/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './fs/io';
export * from './fs/path';
export * from './observability';
