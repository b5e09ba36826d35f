import { describe, it, expect } from 'vitest';
import { SpscArrayQueue, SpscLinkedArrayQueue, addCap, multiplyCap, roundToPowerOfTwo } from './util';

describe('SpscArrayQueue', () => {
    it('rounds its capacity up to a power of two', () => {
        const q = new SpscArrayQueue<number>(3);
        for (let i = 1; i <= 4; i++) {
            expect(q.offer(i)).toBe(true);
        }
        expect(q.offer(5)).toBe(false);
        expect(q.size()).toBe(4);
    });

    it('refuses values beyond its capacity', () => {
        const q = new SpscArrayQueue<number>(2);
        expect(q.offer(1)).toBe(true);
        expect(q.offer(2)).toBe(true);
        expect(q.offer(3)).toBe(false);
        expect(q.size()).toBe(2);
        expect(q.poll()).toBe(1);
        expect(q.offer(3)).toBe(true);
        expect([q.poll(), q.poll(), q.poll()]).toEqual([2, 3, null]);
        expect(q.isEmpty()).toBe(true);
    });
});

describe('SpscLinkedArrayQueue', () => {
    it('grows past its chunk size in FIFO order', () => {
        const q = new SpscLinkedArrayQueue<number>(2);
        for (let i = 1; i <= 5; i++) {
            q.offer(i);
        }
        expect(q.size()).toBe(5);
        const out: Array<number | null> = [];
        for (let i = 0; i < 6; i++) {
            out.push(q.poll());
        }
        expect(out).toEqual([1, 2, 3, 4, 5, null]);
    });

    it('takes a capacity that is not a power of two', () => {
        const q = new SpscLinkedArrayQueue<number>(3);
        for (let i = 1; i <= 7; i++) {
            q.offer(i);
        }
        expect(q.size()).toBe(7);
        expect(q.poll()).toBe(1);
    });

    it('clear empties the queue', () => {
        const q = new SpscLinkedArrayQueue<string>(4);
        q.offer('a');
        q.offer('b');
        q.clear();
        expect(q.isEmpty()).toBe(true);
    });
});

describe('roundToPowerOfTwo', () => {
    it('returns the smallest power of two not below the value', () => {
        expect([0, 1, 2, 3, 4, 5, 7, 9, 128].map(roundToPowerOfTwo)).toEqual([1, 1, 2, 4, 4, 8, 8, 16, 128]);
    });
});

describe('demand arithmetic', () => {
    it('keeps Infinity sticky', () => {
        expect(addCap(1, 2)).toBe(3);
        expect(addCap(Infinity, 1)).toBe(Infinity);
        expect(addCap(Number.MAX_SAFE_INTEGER, 1)).toBe(Infinity);
        expect(multiplyCap(4, 3)).toBe(12);
        expect(multiplyCap(Infinity, 3)).toBe(Infinity);
    });
});
