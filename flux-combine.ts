import * as rs from './reactive-streams';
import * as sp from './subscription';
import * as flow from './flow';
import * as util from './util';
import { ComputationError, Exceptions } from './errors';
import { Hooks } from './hooks';
import type { Assembler, Slot, SlotFactory } from './flux-zip';

interface CombineLane {
    hasValue() : boolean;
    hasPending() : boolean;
    isDone() : boolean;
    cancel() : void;
    requestOne() : void;
}

/** A value update waiting to be applied to its lane before the next combination. */
interface CombineUpdate {
    lane: CombineLane;
    apply: () => void;
}

/**
 * Emits a combination of the latest value of every source each time any
 * source emits, once all of them have emitted at least once. Completes
 * when all sources have completed, or right away when one completes
 * without ever emitting.
 */
export class CombineLatestCoordinator<R> implements rs.Subscription {

    private lanes: CombineLane[] = [];

    private subscriptions: Array<() => void> = [];

    private combiner: () => R;

    private queue: flow.Queue<CombineUpdate>;

    private requested: number = 0;

    private wip: number = 0;

    private completed: number = 0;

    private cancelled: boolean = false;

    private terminated: boolean = false;

    private error: Error | null = null;

    constructor(private actual: rs.Subscriber<R>, assembler: Assembler<R>, private prefetch: number) {
        this.queue = new util.SpscLinkedArrayQueue<CombineUpdate>(prefetch);
        this.combiner = assembler(this.slot);
    }

    private slot : SlotFactory = <X>(source: rs.Publisher<X>) : Slot<X> => {
        const inner = new CombineLatestInnerSubscriber<X, R>(this, this.prefetch);
        this.lanes.push(inner);
        this.subscriptions.push(() => source.subscribe(inner));
        return inner;
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
        }
        this.queue.clear();
    }

    innerNext(update: CombineUpdate) : void {
        this.queue.offer(update);
        this.drain();
    }

    innerError(t: Error) : void {
        if (this.terminated) {
            Hooks.errorDropped(t);
            return;
        }
        this.error = Exceptions.combine(this.error, t);
        this.drain();
    }

    innerComplete() : void {
        this.completed++;
        this.drain();
    }

    private drain() : void {
        if (this.wip++ != 0) {
            return;
        }
        let missed = 1;
        const a = this.actual;
        const q = this.queue;

        for (;;) {
            const r = this.requested;
            let e = 0;

            for (;;) {
                if (this.checkTerminated()) {
                    return;
                }

                if (e == r) {
                    break;
                }

                const u = q.poll();
                if (u == null) {
                    break;
                }

                u.apply();
                u.lane.requestOne();

                if (!this.allHaveValues()) {
                    continue;
                }

                let result: R;
                try {
                    result = this.combiner();
                } catch (ex) {
                    this.error = Exceptions.combine(this.error, ComputationError.wrap(ex));
                    continue;
                }

                if (result == null) {
                    this.error = Exceptions.combine(this.error, Exceptions.nullValue("The combiner"));
                    continue;
                }

                a.onNext(result);

                e++;
            }

            if (e != 0 && r != Infinity) {
                this.requested -= e;
            }

            this.wip -= missed;
            if (this.wip == 0) {
                break;
            }
            missed = this.wip;
        }
    }

    private allHaveValues() : boolean {
        for (const inner of this.lanes) {
            if (!inner.hasValue()) {
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

        const q = this.queue;
        let finished = this.completed == this.lanes.length && q.isEmpty();
        if (!finished) {
            for (const inner of this.lanes) {
                if (inner.isDone() && !inner.hasValue() && !inner.hasPending()) {
                    finished = true;
                    break;
                }
            }
        }

        if (finished) {
            this.terminated = true;
            this.cancelled = true;
            this.clearAll();
            this.actual.onComplete();
            return true;
        }
        return false;
    }
}

class CombineLatestInnerSubscriber<T, R> implements rs.Subscriber<T>, CombineLane, Slot<T> {

    private s: rs.Subscription = sp.SH.UNSET;

    private produced: number = 0;

    private limit: number;

    private latest: T | null = null;

    private pending: number = 0;

    private done : boolean = false;

    constructor(private parent: CombineLatestCoordinator<R>, private prefetch: number) {
        this.limit = prefetch - (prefetch >> 2);
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
        this.pending++;
        this.parent.innerNext({
            lane: this,
            apply: () => {
                this.pending--;
                this.latest = t;
            }
        });
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
        this.parent.innerComplete();
    }

    cancel() : void {
        const a = this.s;
        this.s = sp.SH.CANCELLED;
        a.cancel();
    }

    requestOne() : void {
        const p = this.produced + 1;
        if (p >= this.limit) {
            this.produced = 0;
            this.s.request(p);
        } else {
            this.produced = p;
        }
    }

    hasValue() : boolean {
        return this.latest != null;
    }

    hasPending() : boolean {
        return this.pending != 0;
    }

    value() : T {
        const v = this.latest;
        if (v == null) {
            throw new Error("No value available in this slot");
        }
        return v;
    }

    isDone() : boolean {
        return this.done;
    }
}
