export * from './chunk.stage';
export * from './services/boundary-text-splitter';
export * from './errors/chunk-errors';
export * from './types';
