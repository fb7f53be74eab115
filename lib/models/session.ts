import type { ApiClient } from '../api-client';
import type { AuthService } from '../auth-service';
import { AuthToken } from './auth';

/**
 * State held by the interactive shell between commands
 */
export type Session = {
    client: ApiClient;
    authService: AuthService;
    clientId?: string;
    clientSecret?: string;
    token?: AuthToken;
}
