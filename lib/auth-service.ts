import { IAuthRepository } from './interfaces';
import { AuthToken } from './models';

/**
 * Login facade over any IAuthRepository
 */
export class AuthService<R extends IAuthRepository = IAuthRepository> {
    private repository: R;

    constructor(repository: R) {
        this.repository = repository;
    }

    async login(clientId: string, clientSecret: string): Promise<AuthToken> {
        return this.repository.authenticate(clientId, clientSecret);
    }
}
