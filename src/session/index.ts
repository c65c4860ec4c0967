export * from './session-context';
export * from './session.service';
export * from './session.module';
