import axios, { AxiosRequestConfig, AxiosResponse } from 'axios';
import { AxiosHttpClient, IHttpClient, ILogger, SilentLogger } from './interfaces';
import { ApiClientOptions, FormFields, HeaderPair, HttpMethod, Schema } from './models';
import { DecodeError, RequestFailedError, TransportError } from './errors';

const JSON_CONTENT_TYPE = 'application/json';
const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

export type RequestBody = {
    contentType: string;
    payload: string;
}

export type HeaderMap = Record<string, string | string[]>;

/**
 * Joins a base URL and a request path with exactly one slash between them
 */
export function joinUrl(baseUrl: string, path: string): string {
    const base = baseUrl.replace(/\/+$/, '');
    const suffix = path.replace(/^\/+/, '');
    return suffix ? `${base}/${suffix}` : base;
}

/**
 * Encodes ordered fields as key=value pairs joined by '&'
 */
export function encodeForm(fields: FormFields): string {
    return new URLSearchParams(fields).toString();
}

/**
 * Adds a header, keeping any value already set under the same name
 */
function appendHeader(headers: HeaderMap, name: string, value: string): void {
    const existing = Object.keys(headers).find(key => key.toLowerCase() === name.toLowerCase());
    if (existing === undefined) {
        headers[name] = value;
        return;
    }
    const current = headers[existing];
    headers[existing] = Array.isArray(current) ? [...current, value] : [current, value];
}

/**
 * JSON/form REST client.
 *
 * Holds a base URL and an optional bearer token; every request builds its own
 * headers so one instance can serve concurrent callers. Failures reject with
 * TransportError, RequestFailedError or DecodeError. A JSON body that
 * JSON.stringify cannot serialize (circular, BigInt) rejects with its
 * TypeError before any request is sent; an undefined body is sent as `null`.
 */
export class ApiClient {
    readonly baseUrl: string;
    private readonly token?: string;
    private readonly httpClient: IHttpClient;
    private readonly logger: ILogger;
    private readonly timeout?: number;

    constructor(baseUrl: string, options: ApiClientOptions = {}, token?: string) {
        this.baseUrl = baseUrl;
        this.token = token;
        this.httpClient = options.httpClient || new AxiosHttpClient();
        this.logger = options.logger || new SilentLogger();
        this.timeout = options.timeout;
    }

    /**
     * Returns a client that sends `Authorization: Bearer <token>` on every request
     */
    withToken(token: string): ApiClient {
        return new ApiClient(this.baseUrl, this.options(), token);
    }

    get hasToken(): boolean {
        return this.token !== undefined;
    }

    buildUrl(path: string): string {
        return joinUrl(this.baseUrl, path);
    }

    async getJson<T>(path: string, schema: Schema<T>, extraHeaders?: HeaderPair[], signal?: AbortSignal): Promise<T> {
        return this.send('GET', path, schema, undefined, extraHeaders, signal);
    }

    async postJson<T>(path: string, body: unknown, schema: Schema<T>, extraHeaders?: HeaderPair[], signal?: AbortSignal): Promise<T> {
        return this.send('POST', path, schema, jsonBody(body), extraHeaders, signal);
    }

    async putJson<T>(path: string, body: unknown, schema: Schema<T>, extraHeaders?: HeaderPair[], signal?: AbortSignal): Promise<T> {
        return this.send('PUT', path, schema, jsonBody(body), extraHeaders, signal);
    }

    async postForm<T>(path: string, fields: FormFields, schema: Schema<T>, extraHeaders?: HeaderPair[], signal?: AbortSignal): Promise<T> {
        return this.send('POST', path, schema, formBody(fields), extraHeaders, signal);
    }

    async putForm<T>(path: string, fields: FormFields, schema: Schema<T>, extraHeaders?: HeaderPair[], signal?: AbortSignal): Promise<T> {
        return this.send('PUT', path, schema, formBody(fields), extraHeaders, signal);
    }

    async deleteJson<T>(path: string, schema: Schema<T>, extraHeaders?: HeaderPair[], signal?: AbortSignal): Promise<T> {
        return this.send('DELETE', path, schema, undefined, extraHeaders, signal);
    }

    /**
     * Headers in precedence order: Accept, Authorization, Content-Type, then extras
     */
    buildHeaders(body?: RequestBody, extraHeaders: HeaderPair[] = []): HeaderMap {
        const headers: HeaderMap = { Accept: JSON_CONTENT_TYPE };
        if (this.token !== undefined) {
            headers['Authorization'] = `Bearer ${this.token}`;
        }
        if (body) {
            headers['Content-Type'] = body.contentType;
        }
        for (const [name, value] of extraHeaders) {
            appendHeader(headers, name, value);
        }
        return headers;
    }

    private options(): ApiClientOptions {
        return { httpClient: this.httpClient, logger: this.logger, timeout: this.timeout };
    }

    private async send<T>(
        method: HttpMethod,
        path: string,
        schema: Schema<T>,
        body: RequestBody | undefined,
        extraHeaders: HeaderPair[] | undefined,
        signal: AbortSignal | undefined,
    ): Promise<T> {
        const url = this.buildUrl(path);
        const config: AxiosRequestConfig = {
            method,
            url,
            headers: this.buildHeaders(body, extraHeaders),
            data: body?.payload,
            responseType: 'text',
            transformResponse: [(data: unknown) => data],
            validateStatus: () => true,
            timeout: this.timeout,
            signal,
        };

        this.logger.debug(`${method} ${url}`);

        let response: AxiosResponse<unknown>;
        try {
            response = await this.httpClient.request<unknown>(config);
        } catch (error) {
            const transportError = toTransportError(error);
            this.logger.error(`${method} ${url} failed: ${transportError.message}`);
            throw transportError;
        }

        const text = responseText(response.data);
        this.logger.debug(`${method} ${url} -> ${response.status}`);

        if (response.status < 200 || response.status >= 300) {
            this.logger.warn(`${method} ${url} returned ${response.status}`);
            throw new RequestFailedError(response.status, text);
        }

        return decode(text, schema);
    }
}

function jsonBody(body: unknown): RequestBody {
    return { contentType: JSON_CONTENT_TYPE, payload: JSON.stringify(body ?? null) };
}

function formBody(fields: FormFields): RequestBody {
    return { contentType: FORM_CONTENT_TYPE, payload: encodeForm(fields) };
}

function responseText(data: unknown): string {
    if (data === undefined || data === null) return '';
    if (typeof data === 'string') return data;
    if (Buffer.isBuffer(data)) return data.toString('utf8');
    return JSON.stringify(data);
}

function toTransportError(error: unknown): TransportError {
    if (axios.isAxiosError(error)) {
        return new TransportError(error.message, error.code, error);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(message, undefined, error);
}

/**
 * Parses and validates a 2xx body. An empty body (e.g. 204) is parsed as
 * `null`, so only schemas that accept null succeed on it.
 */
function decode<T>(text: string, schema: Schema<T>): T {
    let json: unknown;
    try {
        json = text.trim() === '' ? null : JSON.parse(text);
    } catch (error) {
        throw new DecodeError('Response body is not valid JSON', text, [], error);
    }

    const result = schema.safeParse(json);
    if (!result.success) {
        throw new DecodeError(`Response body does not match the expected shape: ${result.error.message}`, text, result.error.issues, result.error);
    }
    return result.data;
}
