import { z } from 'zod';
import { ApiClient } from './api-client';
import { ApiClientOptions, AuthToken, FormFields, HeaderPair, HttpMethod, Session } from './models';
import { AuthService } from './auth-service';
import { RestAuthRepository } from './auth-repository';
import { ApiFailure, isApiError } from './errors';

const anyJson = z.unknown();

/**
 * Wires client, repository and service for a shell session
 */
export function createSession(
    baseUrl: string,
    authPath: string,
    options: ApiClientOptions = {},
    credentials: { clientId?: string; clientSecret?: string } = {},
): Session {
    const client = new ApiClient(baseUrl, options);
    const authService = new AuthService(new RestAuthRepository(baseUrl, authPath, options));
    return { client, authService, ...credentials };
}

/**
 * One-line summary of a token; the token value itself is never printed
 */
export function describeToken(token: AuthToken): string {
    const details = [token.token_type];
    if (token.expires_in !== undefined) details.push(`expires in ${token.expires_in}s`);
    if (token.scope !== undefined) details.push(`scope "${token.scope}"`);
    if (token.refresh_token !== undefined) details.push('refreshable');
    return details.join(', ');
}

/**
 * Human-readable message for each failure kind
 */
export function describeError(error: ApiFailure): string {
    switch (error.kind) {
        case 'transport':
            return `Transport error${error.code ? ` (${error.code})` : ''}: ${error.message}`;
        case 'request':
            return `Request failed with status ${error.status}${error.body ? `: ${error.body}` : ''}`;
        case 'decode':
            return `Decode error: ${error.message}`;
    }
}

/**
 * Parses "Name: value" into a header pair
 */
export function parseHeader(raw: string): HeaderPair {
    const separator = raw.indexOf(':');
    if (separator <= 0) {
        throw new Error(`Invalid header "${raw}": expected "Name: value"`);
    }
    return [raw.slice(0, separator).trim(), raw.slice(separator + 1).trim()];
}

/**
 * Parses key=value arguments into ordered form fields
 */
export function parseFormFields(args: string[]): FormFields {
    return args.map(arg => {
        const separator = arg.indexOf('=');
        if (separator <= 0) {
            throw new Error(`Invalid form field "${arg}": expected key=value`);
        }
        const field: [string, string] = [arg.slice(0, separator), arg.slice(separator + 1)];
        return field;
    });
}

export function parseJsonBody(raw: string | undefined): unknown {
    if (raw === undefined) {
        throw new Error('Missing JSON body');
    }
    try {
        return JSON.parse(raw);
    } catch (error) {
        throw new Error(`Invalid JSON body: ${error instanceof Error ? error.message : String(error)}`);
    }
}

/**
 * Authenticates with the given or configured credentials and stores the token
 */
export async function login(session: Session, clientId?: string, clientSecret?: string): Promise<boolean> {
    const id = clientId ?? session.clientId;
    const secret = clientSecret ?? session.clientSecret;
    if (!id || !secret) {
        console.log('Client id and secret are required (pass them or set API_CLIENT_ID and API_CLIENT_SECRET).');
        return false;
    }

    let token: AuthToken;
    try {
        token = await session.authService.login(id, secret);
    } catch (error) {
        if (!isApiError(error)) throw error;
        console.error(`Login failed. ${describeError(error)}`);
        return false;
    }

    session.token = token;
    console.log(`Logged in (${describeToken(token)})`);
    return true;
}

export function logout(session: Session): void {
    session.token = undefined;
    console.log('Logged out.');
}

export function showToken(session: Session): void {
    if (!session.token) {
        console.log('Not logged in.');
        return;
    }
    console.log(describeToken(session.token));
}

export type RequestInput =
    | { kind: 'none' }
    | { kind: 'json'; body: unknown }
    | { kind: 'form'; fields: FormFields };

/**
 * Sends one request with the session token (if any) and prints the decoded response
 */
export async function sendRequest(
    session: Session,
    method: HttpMethod,
    path: string,
    input: RequestInput,
    headers: HeaderPair[] = [],
): Promise<unknown> {
    const client = session.token ? session.client.withToken(session.token.access_token) : session.client;

    let result: unknown;
    try {
        result = await dispatch(client, method, path, input, headers);
    } catch (error) {
        if (!isApiError(error)) throw error;
        console.error(describeError(error));
        return undefined;
    }

    console.log(JSON.stringify(result, null, 2));
    return result;
}

async function dispatch(
    client: ApiClient,
    method: HttpMethod,
    path: string,
    input: RequestInput,
    headers: HeaderPair[],
): Promise<unknown> {
    switch (method) {
        case 'GET':
            return client.getJson(path, anyJson, headers);
        case 'DELETE':
            return client.deleteJson(path, anyJson, headers);
        case 'POST':
            return input.kind === 'form'
                ? client.postForm(path, input.fields, anyJson, headers)
                : client.postJson(path, input.kind === 'json' ? input.body : null, anyJson, headers);
        case 'PUT':
            return input.kind === 'form'
                ? client.putForm(path, input.fields, anyJson, headers)
                : client.putJson(path, input.kind === 'json' ? input.body : null, anyJson, headers);
    }
}
