import { describe, it, expect } from 'vitest';
import { Signals, format } from './signal';
import { UpstreamError } from './errors';

describe('Signals', () => {
    it('describes each kind of signal', () => {
        expect(Signals.describe(Signals.next([1, 'a']))).toBe('onNext([1, a])');
        expect(Signals.describe(Signals.error(new UpstreamError('gone')))).toBe('onError(UpstreamError: gone)');
        expect(Signals.describe(Signals.complete())).toBe('onComplete()');
    });

    it('tells terminal signals apart', () => {
        expect(Signals.isTerminal(Signals.next(1))).toBe(false);
        expect(Signals.isTerminal(Signals.complete())).toBe(true);
    });

    it('formats values for log lines', () => {
        expect(format('plain')).toBe('plain');
        expect(format(BigInt(12))).toBe('12');
        expect(format({ a: 1 })).toBe('{"a":1}');
        expect(format([[1, 2], []])).toBe('[[1, 2], []]');
        expect(format(null)).toBe('null');
    });
});
