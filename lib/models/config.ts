import { LogLevel } from "../interfaces";

/**
 * Settings for the interactive shell, read from the environment
 */
export type AppConfig = {
    baseUrl: string;
    authPath: string;
    clientId?: string;
    clientSecret?: string;
    timeout: number;
    logLevel: LogLevel;
}
