export const name = '@snakify/migrate';

export * from './naming/transformer';
export * from './rules';
export * from './rewriter/content-rewriter';
export * from './scanner';
export * from './planner';
export * from './committer';
export * from './config/loader';
export * from './migrator';
