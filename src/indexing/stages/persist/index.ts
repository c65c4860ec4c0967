export * from './persist.stage';
export * from './errors/persist-errors';
