export * from './api';
export * from './auth';
export * from './common';
export * from './config';
export * from './session';
