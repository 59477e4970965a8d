/**
 * sample.test.ts
 *
 * Runs the email sample end to end with an in-memory logger.
 */
import { describe, it, expect } from 'vitest';
import { runEmailSample } from '../src/main.js';
import { emailRedactor, emailValidator, requestLogger } from '../src/interceptors.js';
import { type Logger } from '../src/logger.js';

function memoryLogger(): Logger & { lines: string[] } {
    const lines: string[] = [];
    return { lines, info: message => { lines.push(message); } };
}

describe('Email sample', () => {
    it('declares the three interceptors with their kinds, priorities and phases', () => {
        expect(emailRedactor.descriptor).toMatchObject({ id: 'email-redactor', kind: 'Mutation', priority: 10 });
        expect(emailValidator.descriptor).toMatchObject({ id: 'email-validator', kind: 'Validation', applicablePhases: ['Response'] });
        expect(requestLogger.descriptor).toMatchObject({ id: 'request-logger', kind: 'Observability', priority: 1 });
    });

    it('redacts the request without running the response-only validator', async () => {
        const { request } = await runEmailSample(memoryLogger());

        expect(request).toEqual({
            modifiedPayload: { text: 'Contact [REDACTED_EMAIL] or [REDACTED_EMAIL]' },
            allValidationResults: [],
            metadata: { 'email-redactor': { interceptor: 'email-redactor', redacted: true, count: 2 } },
        });
    });

    it('redacts the response and flags the address the validator saw', async () => {
        const { response } = await runEmailSample(memoryLogger());

        expect(response).toEqual({
            modifiedPayload: { content: 'Reply to [REDACTED_EMAIL]' },
            allValidationResults: [
                { severity: 'Warning', message: 'Found potentially unredacted email: bob@example.net', path: '$.payload' },
            ],
            metadata: { 'email-redactor': { interceptor: 'email-redactor', redacted: true, count: 1 } },
        });
    });

    it('logs each event through the injected logger', async () => {
        const logger = memoryLogger();
        const { observations } = await runEmailSample(logger);

        expect([...logger.lines].sort()).toEqual([
            'Interceptor invoked for event: tools/call, phase: Request',
            'Interceptor invoked for event: tools/call, phase: Response',
        ]);
        expect(observations.get('request-logger')).toMatchObject({
            status: 'success',
            metadata: { interceptor: 'request-logger' },
        });
    });
});
