export * from './load.stage';
export * from './types';
