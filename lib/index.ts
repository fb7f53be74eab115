export { ApiClient, joinUrl, encodeForm } from './api-client';
export type { HeaderMap, RequestBody } from './api-client';
export { RestAuthRepository } from './auth-repository';
export { AuthService } from './auth-service';
export { loadConfig } from './config';
export * from './errors';
export * from './interfaces';
export * from './models';
