import { AuthToken } from '../models/auth';

/**
 * Capability for exchanging client credentials for a token.
 * Implementations reject with the underlying ApiError unchanged.
 */
export interface IAuthRepository {
    authenticate(clientId: string, clientSecret: string): Promise<AuthToken>;
}
