/**
 * Email Sample: Runs the Email Interceptors Over a Request and a Response
 *
 * Run directly to print both chain results as JSON.
 */
import { pathToFileURL } from 'node:url';
import { createInterceptorEngine, ServiceContainer, type ChainResult, type Observation } from '../../../src/index.js';
import { emailInterceptors } from './interceptors.js';
import { Logger, createConsoleLogger } from './logger.js';

const EVENT = 'tools/call';
const IDS = ['request-logger', 'email-validator', 'email-redactor'];

export interface EmailSampleResult {
    readonly request: ChainResult;
    readonly response: ChainResult;
    readonly observations: ReadonlyMap<string, Observation>;
}

export async function runEmailSample(logger: Logger = createConsoleLogger()): Promise<EmailSampleResult> {
    const engine = createInterceptorEngine({
        services: new ServiceContainer().addInstance(Logger, logger),
    });
    engine.register(...emailInterceptors);

    const request = await engine.executeChain({
        interceptorIds: IDS,
        event: EVENT,
        phase: 'Request',
        payload: { text: 'Contact jane.doe@example.com or ops@example.org' },
    });
    const response = await engine.executeChain({
        interceptorIds: IDS,
        event: EVENT,
        phase: 'Response',
        payload: { content: 'Reply to bob@example.net' },
    });

    await engine.shutdown();
    return { request, response, observations: engine.observations.snapshot() };
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    const { request, response } = await runEmailSample();
    console.log(JSON.stringify({ request, response }, null, 2));
}
