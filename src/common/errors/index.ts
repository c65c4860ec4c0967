export * from './rag-error';
export * from './http-error.mapper';
