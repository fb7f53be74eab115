import { ApiClient } from './api-client';
import { IAuthRepository } from './interfaces';
import { ApiClientOptions, AuthToken, authTokenSchema, FormFields } from './models';

/**
 * Client-credentials authentication against a REST token endpoint.
 * Owns a client without a bearer token; any failure is rethrown as-is.
 */
export class RestAuthRepository implements IAuthRepository {
    private client: ApiClient;
    private authPath: string;

    constructor(baseUrl: string, authPath: string, options: ApiClientOptions = {}) {
        this.client = new ApiClient(baseUrl, options);
        this.authPath = authPath;
    }

    async authenticate(clientId: string, clientSecret: string): Promise<AuthToken> {
        const form: FormFields = [
            ['client_id', clientId],
            ['client_secret', clientSecret],
        ];
        return this.client.postForm(this.authPath, form, authTokenSchema);
    }
}
