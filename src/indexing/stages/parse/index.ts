export * from './parse.stage';
export * from './tei-document.parser';
export * from './errors/parse-errors';
export * from './types';
