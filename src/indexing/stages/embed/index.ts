export * from './embed.stage';
export * from './types';
export * from './errors/embed-errors';
