import { describe, it, expect } from 'vitest';
import {
    classifyError,
    UpstreamUnavailableError,
    UpstreamMalformedResponseError,
    ToolCallError,
    ConfigError,
} from '../../src/core/errors.js';

describe('classifyError', () => {
    it('keeps the kind of typed handler errors', () => {
        const unavailable = new UpstreamUnavailableError('down', 'https://data.example/records', 503);
        expect(classifyError(unavailable)).toEqual({
            kind: 'UpstreamUnavailable', message: 'down', cause: unavailable,
        });

        const malformed = new UpstreamMalformedResponseError('bad shape', 'https://data.example/records', ['results: Required']);
        expect(classifyError(malformed).kind).toBe('UpstreamMalformedResponse');
    });

    it('maps any other Error to InternalFault', () => {
        expect(classifyError(new TypeError('x is undefined'))).toMatchObject({
            kind: 'InternalFault', message: 'x is undefined',
        });
        expect(classifyError(new RangeError()).message).toBe('RangeError');
    });

    it('maps non-Error throws to InternalFault', () => {
        expect(classifyError('boom')).toEqual({ kind: 'InternalFault', message: 'boom', cause: 'boom' });
        expect(classifyError(42).message).toBe('42');
    });
});

describe('typed errors', () => {
    it('carry their class name and context', () => {
        const err = new UpstreamUnavailableError('down', 'https://data.example/records', 502);
        expect(err).toBeInstanceOf(ToolCallError);
        expect(err.name).toBe('UpstreamUnavailableError');
        expect(err.url).toBe('https://data.example/records');
        expect(err.status).toBe(502);
    });

    it('keep the cause', () => {
        const cause = new Error('socket hang up');
        const err = new UpstreamUnavailableError('down', 'https://data.example', undefined, { cause });
        expect(err.cause).toBe(cause);
    });

    it('list configuration problems', () => {
        const err = new ConfigError('Invalid configuration', ['A: bad']);
        expect(err.name).toBe('ConfigError');
        expect(err.problems).toEqual(['A: bad']);
    });
});
