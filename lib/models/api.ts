import { ZodType, ZodTypeDef } from "zod";
import { IHttpClient, ILogger } from "../interfaces";

/**
 * HTTP methods the client dispatches
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * A single header as a name/value pair
 */
export type HeaderPair = [name: string, value: string];

/**
 * Ordered form fields, encoded as application/x-www-form-urlencoded
 */
export type FormFields = Array<[key: string, value: string]>;

/**
 * Options for constructing an ApiClient
 */
export type ApiClientOptions = {
    httpClient?: IHttpClient;
    logger?: ILogger;
    timeout?: number; // milliseconds, enforced by the transport
}

/**
 * Decoder for a response body; the input side is left open so schemas with transforms fit
 */
export type Schema<T> = ZodType<T, ZodTypeDef, unknown>;
