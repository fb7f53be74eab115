export * from './http-interface';
export * from './logger-interface';
export * from './auth-repository-interface';
