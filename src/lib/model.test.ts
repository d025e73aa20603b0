import { describe, expect, it } from 'vitest';
import OpenAI from 'openai';
import { MalformedToolCallError, RateLimitError } from './errors.js';
import { classifyEndpointError } from './model.js';

describe('classifyEndpointError', () => {
    it('recognises a 429 throttle', () => {
        const err = OpenAI.APIError.generate(
            429,
            { error: { message: 'Rate limit reached for model (RPM)', type: 'requests', code: 'rate_limit_exceeded' } },
            undefined,
            {}
        );
        expect(classifyEndpointError(err)).toBeInstanceOf(RateLimitError);
    });

    it('recognises the tokens-per-minute limit reported as 413', () => {
        const err = OpenAI.APIError.generate(
            413,
            { error: { message: 'Request too large for model (TPM)', type: 'tokens', code: 'rate_limit_exceeded' } },
            undefined,
            {}
        );
        expect(err).not.toBeInstanceOf(OpenAI.RateLimitError);
        expect(classifyEndpointError(err)).toBeInstanceOf(RateLimitError);
    });

    it('recognises tool calls the endpoint could not parse', () => {
        const err = OpenAI.APIError.generate(
            400,
            {
                error: {
                    message: 'Failed to call a function. Please adjust your prompt.',
                    type: 'invalid_request_error',
                    code: 'tool_use_failed',
                },
            },
            undefined,
            {}
        );
        expect(classifyEndpointError(err)).toBeInstanceOf(MalformedToolCallError);
    });

    it('passes anything else through untouched', () => {
        const original = OpenAI.APIError.generate(
            401,
            { error: { message: 'Invalid API Key', type: 'invalid_request_error', code: 'invalid_api_key' } },
            undefined,
            {}
        );
        expect(classifyEndpointError(original)).toBe(original);

        const plain = new Error('socket hang up');
        expect(classifyEndpointError(plain)).toBe(plain);
    });
});
