export * from './config.util';
export * from './async.util';
