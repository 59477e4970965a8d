/**
 * Email Interceptors: Redaction, Leak Validation and Request Logging
 *
 * - `email-redactor` (Mutation, priority 10): masks every address
 * - `email-validator` (Validation, responses only): flags addresses
 *   still present in an outgoing payload
 * - `request-logger` (Observability, priority 1): one log line per event
 */
import { defineInterceptor, findings, metadata, modified, p, warning } from '../../../src/index.js';
import { Logger } from './logger.js';

/** Simplified address pattern; good enough for a demonstration. */
const EMAIL = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

export const REDACTED = '[REDACTED_EMAIL]';

export const emailRedactor = defineInterceptor('email-redactor', {
    kind: 'Mutation',
    name: 'Email Redaction Interceptor',
    description: `Redacts email addresses from request and response payloads by replacing them with ${REDACTED}.`,
    priority: 10,
    params: { payload: p.context('payload') },
    handler: ({ payload }) => {
        if (payload === undefined) return;

        // Addresses are matched inside the serialized payload, so every nested string is covered.
        const raw = JSON.stringify(payload);
        const count = raw.match(EMAIL)?.length ?? 0;
        const redacted: unknown = JSON.parse(raw.replace(EMAIL, REDACTED));

        return modified(redacted, { interceptor: 'email-redactor', redacted: count > 0, count });
    },
});

export const emailValidator = defineInterceptor('email-validator', {
    kind: 'Validation',
    name: 'Email Leak Validator',
    description: "Validates that response payloads don't contain unredacted email addresses.",
    priority: 5,
    phases: ['Response'],
    params: { payload: p.context('payload') },
    handler: ({ payload }) => {
        const raw = JSON.stringify(payload) ?? '';
        const leaks = raw.match(EMAIL) ?? [];
        return findings(leaks.map(address => warning(`Found potentially unredacted email: ${address}`, '$.payload')));
    },
});

export const requestLogger = defineInterceptor('request-logger', {
    kind: 'Observability',
    name: 'Request Logger',
    description: 'Logs when interceptors are invoked for observability.',
    priority: 1,
    params: { request: p.context('request'), logger: p.service(Logger) },
    handler: ({ request, logger }) => {
        logger.info(`Interceptor invoked for event: ${request.event}, phase: ${request.phase}`);
        return metadata({ interceptor: 'request-logger', timestamp: new Date().toISOString() });
    },
});

export const emailInterceptors = [emailRedactor, emailValidator, requestLogger];
