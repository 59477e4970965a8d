/**
 * Logger Service: Injected into Interceptors Through the Service Resolver
 */
import { createServiceToken } from '../../../src/index.js';

export interface Logger {
    info(message: string): void;
}

export const Logger = createServiceToken<Logger>('Logger');

export function createConsoleLogger(): Logger {
    return { info: message => console.info(`[email-sample] ${message}`) };
}
