import { describe, it, expect, vi } from 'vitest';
import {
    createEventSink,
    combineObservers,
    type DebugEvent,
} from '../../src/observability/DebugObserver.js';

const event: DebugEvent = { type: 'route', tool: 'railway-lines', requestId: 1, timestamp: 0 };

describe('createEventSink', () => {
    it('forwards events to the observer', () => {
        const observer = vi.fn();
        createEventSink(observer).emit(event);
        expect(observer).toHaveBeenCalledWith(event);
    });

    it('discards events without an observer', () => {
        const sink = createEventSink();
        expect(() => sink.emit(event)).not.toThrow();
        expect(sink.failures).toBe(0);
    });

    it('counts observer failures instead of throwing', () => {
        const failure = new Error('disk full');
        const sink = createEventSink(() => {
            throw failure;
        });

        sink.emit(event);
        sink.emit(event);

        expect(sink.failures).toBe(2);
        expect(sink.lastFailure).toBe(failure);
    });
});

describe('combineObservers', () => {
    it('delivers to every observer in order', () => {
        const seen: string[] = [];
        const combined = combineObservers(() => seen.push('a'), () => seen.push('b'));
        combined(event);
        expect(seen).toEqual(['a', 'b']);
    });

    it('keeps going past a failing observer and rethrows its error', () => {
        const first = new Error('first');
        const later = vi.fn();
        const combined = combineObservers(
            () => { throw first; },
            () => { throw new Error('second'); },
            later,
        );

        expect(() => combined(event)).toThrow(first);
        expect(later).toHaveBeenCalledOnce();
    });

    it('is counted once by the sink', () => {
        const sink = createEventSink(combineObservers(() => { throw new Error('x'); }));
        sink.emit(event);
        expect(sink.failures).toBe(1);
    });
});
