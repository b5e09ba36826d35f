import * as rs from './reactive-streams';
import * as sp from './subscription';
import * as flow from './flow';
import * as util from './util';
import { ComputationError, Exceptions } from './errors';
import { Hooks } from './hooks';

/** Typed read access to the value a source currently contributes to a combination. */
export interface Slot<X> {
    value() : X;
}

/** Registers a source with a coordinator and returns the typed slot its values land in. */
export type SlotFactory = <X>(source: rs.Publisher<X>) => Slot<X>;

/**
 * Describes a combination: registers every source through `slot` and
 * returns the function computing one result from the current slot values.
 */
export type Assembler<R> = (slot: SlotFactory) => () => R;

interface ZipLane {
    fill() : boolean;
    drop() : void;
    isDone() : boolean;
    consumed(n: number) : void;
    cancel() : void;
    clear() : void;
}

/**
 * Pairs the n-th values of every source into one result; completes as soon
 * as any source has completed and has no value left to pair.
 */
export class ZipCoordinator<R> implements rs.Subscription {

    private lanes: ZipLane[] = [];

    private subscriptions: Array<() => void> = [];

    private combiner: () => R;

    private requested: number = 0;

    private wip: number = 0;

    private cancelled: boolean = false;

    private terminated: boolean = false;

    private error: Error | null = null;

    constructor(private actual: rs.Subscriber<R>, assembler: Assembler<R>, private prefetch: number) {
        this.combiner = assembler(this.slot);
    }

    private slot : SlotFactory = <X>(source: rs.Publisher<X>) : Slot<X> => {
        const inner = new ZipInnerSubscriber<X, R>(this, this.prefetch);
        this.lanes.push(inner);
        this.subscriptions.push(() => source.subscribe(inner));
        return inner;
    }

    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            this.requested = util.addCap(this.requested, n);
            this.drain();
        }
    }

    cancel() : void {
        if (!this.cancelled) {
            this.cancelled = true;

            if (this.wip++ == 0) {
                this.clearAll();
            }
        }
    }

    private clearAll() : void {
        for (const inner of this.lanes) {
            inner.cancel();
            inner.clear();
        }
    }

    subscribe() : void {
        if (this.lanes.length == 0) {
            sp.EmptySubscription.complete(this.actual);
            return;
        }
        this.actual.onSubscribe(this);
        for (const task of this.subscriptions) {
            if (this.cancelled) {
                break;
            }
            task();
        }
        this.subscriptions = [];
    }

    innerError(t: Error) : void {
        if (this.terminated) {
            Hooks.errorDropped(t);
            return;
        }
        this.error = Exceptions.combine(this.error, t);
        this.drain();
    }

    drain() : void {
        if (this.wip++ != 0) {
            return;
        }
        let missed = 1;
        const a = this.actual;
        const lanes = this.lanes;

        for (;;) {
            const r = this.requested;
            let e = 0;

            for (;;) {
                if (this.checkTerminated()) {
                    return;
                }

                if (!this.rowReady()) {
                    if (this.terminated) {
                        return;
                    }
                    break;
                }

                if (e == r) {
                    break;
                }

                let result: R;

                try {
                    result = this.combiner();
                } catch (ex) {
                    this.error = Exceptions.combine(this.error, ComputationError.wrap(ex));
                    continue;
                }

                if (result == null) {
                    this.error = Exceptions.combine(this.error, Exceptions.nullValue("The zipper"));
                    continue;
                }

                for (const inner of lanes) {
                    inner.drop();
                }

                a.onNext(result);

                e++;
            }

            if (e != 0) {
                if (r != Infinity) {
                    this.requested -= e;
                }

                for (const inner of lanes) {
                    inner.consumed(e);
                }
            }

            this.wip -= missed;
            if (this.wip == 0) {
                break;
            }
            missed = this.wip;
        }
    }

    /** True when every lane holds a value; completes downstream when an exhausted lane makes that impossible. */
    private rowReady() : boolean {
        for (const inner of this.lanes) {
            if (!inner.fill()) {
                if (inner.isDone()) {
                    this.terminated = true;
                    this.cancelled = true;
                    this.clearAll();
                    this.actual.onComplete();
                }
                return false;
            }
        }
        return true;
    }

    private checkTerminated() : boolean {
        if (this.cancelled) {
            this.clearAll();
            return true;
        }

        const ex = this.error;
        if (ex != null) {
            this.terminated = true;
            this.cancelled = true;
            this.clearAll();
            this.actual.onError(ex);
            return true;
        }
        return false;
    }
}

class ZipInnerSubscriber<T, R> implements rs.Subscriber<T>, ZipLane, Slot<T> {

    private s: rs.Subscription = sp.SH.UNSET;

    private produced: number = 0;

    private limit: number;

    private queue: flow.Queue<T>;

    private head: T | null = null;

    private done : boolean = false;

    constructor(private parent: ZipCoordinator<R>, private prefetch: number) {
        this.limit = prefetch - (prefetch >> 2);
        this.queue = new util.SpscArrayQueue<T>(prefetch);
    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;
            s.request(this.prefetch);
        }
    }

    onNext(t: T) : void {
        if (this.done) {
            return;
        }
        if (!this.queue.offer(t)) {
            this.s.cancel();
            this.onError(Exceptions.lackOfRequests("zipped value"));
            return;
        }
        this.parent.drain();
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.done = true;
        this.parent.innerError(t);
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        this.parent.drain();
    }

    cancel() : void {
        const a = this.s;
        this.s = sp.SH.CANCELLED;
        a.cancel();
    }

    consumed(n : number) : void {
        const p = this.produced + n;
        if (p >= this.limit) {
            this.produced = 0;
            this.s.request(p);
        } else {
            this.produced = p;
        }
    }

    clear() : void {
        this.head = null;
        this.queue.clear();
    }

    fill() : boolean {
        if (this.head == null) {
            this.head = this.queue.poll();
        }
        return this.head != null;
    }

    value() : T {
        const v = this.head;
        if (v == null) {
            throw new Error("No value available in this slot");
        }
        return v;
    }

    drop() : void {
        this.head = null;
    }

    isDone() : boolean {
        return this.done;
    }
}
