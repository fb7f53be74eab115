import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';

/**
 * HTTP transport abstraction interface for testability
 */
export interface IHttpClient {
    request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>>;
}

/**
 * Default implementation using axios
 */
export class AxiosHttpClient implements IHttpClient {
    private instance: AxiosInstance;

    constructor(instance: AxiosInstance = axios.create()) {
        this.instance = instance;
    }

    async request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
        return this.instance.request<T>(config);
    }
}
