import { describe, it, expect } from 'vitest';
import { parseCliArgs } from './cli';

describe('parseCliArgs', () => {
    it('runs everything by default', () => {
        expect(parseCliArgs([])).toEqual({ only: undefined, list: false, help: false });
    });

    it('splits the selected examples', () => {
        expect(parseCliArgs(['--only', 'greeting, rangeExample,']).only).toEqual(['greeting', 'rangeExample']);
    });

    it('rejects unknown example names', () => {
        expect(() => parseCliArgs(['--only', 'greeting,nope,missing'])).toThrow('Unknown example(s): nope, missing');
    });

    it('reads the flags', () => {
        expect(parseCliArgs(['-h']).help).toBe(true);
        expect(parseCliArgs(['--list']).list).toBe(true);
    });

    it('rejects unknown options', () => {
        expect(() => parseCliArgs(['--bogus'])).toThrow();
    });
});
