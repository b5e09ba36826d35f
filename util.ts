import * as flow from "./flow";

/** A single-producer, single-consumer queue; the capacity is rounded up to a power of 2. */
export class SpscArrayQueue<T> implements flow.Queue<T> {
    private mMask : number;
    private mArray : Array<T | null>;
    private mProducerIndex : number;
    private mConsumerIndex : number;

    constructor(capacity : number) {
        capacity = roundToPowerOfTwo(capacity);
        this.mMask = capacity - 1;
        const a = new Array<T | null>(capacity);
        a.fill(null);
        this.mArray = a;
        this.mProducerIndex = 0;
        this.mConsumerIndex = 0;
    }

    offer(t: T) : boolean {
        if (t == null) {
            throw new Error("t is null");
        }
        const a = this.mArray;
        const pi = this.mProducerIndex;
        const o = pi & this.mMask;

        if (a[o] != null) {
            return false;
        }
        a[o] = t;
        this.mProducerIndex = pi + 1;
        return true;
    }

    poll() : T | null {
        const a = this.mArray;
        const ci = this.mConsumerIndex;
        const o = ci & this.mMask;

        const v = a[o];
        if (v != null) {
            a[o] = null;
            this.mConsumerIndex = ci + 1;
            return v;
        }
        return null;
    }

    isEmpty() : boolean {
        return this.mProducerIndex == this.mConsumerIndex;
    }

    size() : number {
        return this.mProducerIndex - this.mConsumerIndex;
    }

    clear() : void {
        while (this.poll() != null);
    }
}

class Chunk<T> {
    readonly items : Array<T | null>;
    next : Chunk<T> | null = null;

    constructor(capacity: number) {
        this.items = new Array<T | null>(capacity).fill(null);
    }
}

/** A single-producer, single-consumer unbounded queue growing in power-of-2 sized chunks. */
export class SpscLinkedArrayQueue<T> implements flow.Queue<T> {
    private readonly mCapacity: number;
    private mProducerChunk: Chunk<T>;
    private mProducerOffset: number;
    private mConsumerChunk: Chunk<T>;
    private mConsumerOffset: number;
    private mSize: number;

    constructor(capacity: number) {
        capacity = Math.max(2, roundToPowerOfTwo(capacity));
        this.mCapacity = capacity;
        const c = new Chunk<T>(capacity);
        this.mProducerChunk = c;
        this.mProducerOffset = 0;
        this.mConsumerChunk = c;
        this.mConsumerOffset = 0;
        this.mSize = 0;
    }

    offer(t: T) : boolean {
        if (t == null) {
            throw new Error("t is null");
        }
        if (this.mProducerOffset == this.mCapacity) {
            const b = new Chunk<T>(this.mCapacity);
            this.mProducerChunk.next = b;
            this.mProducerChunk = b;
            this.mProducerOffset = 0;
        }
        this.mProducerChunk.items[this.mProducerOffset++] = t;
        this.mSize++;
        return true;
    }

    poll() : T | null {
        if (this.mSize == 0) {
            return null;
        }
        if (this.mConsumerOffset == this.mCapacity) {
            const b = this.mConsumerChunk.next;
            if (b == null) {
                return null;
            }
            this.mConsumerChunk.next = null;
            this.mConsumerChunk = b;
            this.mConsumerOffset = 0;
        }
        const a = this.mConsumerChunk.items;
        const o = this.mConsumerOffset;
        const v = a[o];
        if (v == null) {
            return null;
        }
        a[o] = null;
        this.mConsumerOffset = o + 1;
        this.mSize--;
        return v;
    }

    isEmpty() : boolean {
        return this.mSize == 0;
    }

    size() : number {
        return this.mSize;
    }

    clear() : void {
        while (this.poll() != null);
    }
}

/** Adds two demand amounts, keeping Infinity sticky. */
export function addCap(a: number, b: number) : number {
    const r = a + b;
    return r >= Number.MAX_SAFE_INTEGER ? Infinity : r;
}

/** Multiplies a demand amount, keeping Infinity sticky. */
export function multiplyCap(a: number, b: number) : number {
    const r = a * b;
    return r >= Number.MAX_SAFE_INTEGER ? Infinity : r;
}

/** The smallest power of 2 not below `n`, for queue capacities. */
export function roundToPowerOfTwo(n: number) : number {
    return n <= 1 ? 1 : 1 << (32 - Math.clz32(n - 1));
}
