import * as flow from './flow';
import * as rs from './reactive-streams';
import * as sp from './subscription';
import * as util from './util';
import { ComputationError, Exceptions } from './errors';
import { Hooks } from './hooks';

/**
 * Maps each value to an inner Publisher and merges up to `maxConcurrency`
 * of them, emitting inner values as they arrive. Any error, from the
 * mapper, the source or an inner, cancels everything and is relayed.
 */
export class FlatMapSubscriber<T, R> implements rs.Subscriber<T>, rs.Subscription {

    private wip: number = 0;
    private requested: number = 0;

    private cancelled: boolean = false;
    private done: boolean = false;
    private terminated: boolean = false;
    private error: Error | null = null;

    private s: rs.Subscription = sp.SH.UNSET;

    private scalarQueue : flow.Queue<R> | null = null;

    private subscribers: Array<FlatMapInnerSubscriber<T, R>> = [];

    private mIndex: number = 0;

    constructor(
        private mActual: rs.Subscriber<R>,
        private mMapper: (t: T) => rs.Publisher<R>,
        private mMaxConcurrency: number,
        private mPrefetch: number
    ) {

    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.mActual.onSubscribe(this);

            s.request(this.mMaxConcurrency);
        }
    }

    onNext(t: T) : void {
        if (this.done) {
            return;
        }

        let p: rs.Publisher<R>;

        try {
            p = this.mMapper(t);
        } catch (ex) {
            this.s.cancel();
            this.onError(ComputationError.wrap(ex));
            return;
        }

        if (p == null) {
            this.s.cancel();
            this.onError(Exceptions.nullValue("The mapper"));
            return;
        }

        if (flow.isScalarCallable(p)) {
            let v : R | null;
            try {
                v = p.call();
            } catch (ex) {
                this.s.cancel();
                this.onError(Exceptions.propagate(ex));
                return;
            }
            if (v == null) {
                this.replenish(1);
            } else {
                this.scalarQueueOrCreate().offer(v);
                this.drain();
            }
        } else {
            const inner = new FlatMapInnerSubscriber<T, R>(this, this.mPrefetch);
            this.subscribers.push(inner);

            p.subscribe(inner);
        }
    }

    private scalarQueueOrCreate() : flow.Queue<R> {
        let q = this.scalarQueue;
        if (q == null) {
            q = new util.SpscLinkedArrayQueue<R>(this.mPrefetch);
            this.scalarQueue = q;
        }
        return q;
    }

    private replenish(n: number) : void {
        if (!this.done && this.mMaxConcurrency != Infinity) {
            this.s.request(n);
        }
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.error = Exceptions.combine(this.error, t);
        this.done = true;
        this.drain();
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        this.drain();
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
            this.s.cancel();

            if (this.wip++ == 0) {
                this.cleanup();
            }
        }
    }

    innerError(inner: FlatMapInnerSubscriber<T, R>, t: Error) : void {
        if (this.terminated) {
            Hooks.errorDropped(t);
            return;
        }
        inner.done = true;
        this.error = Exceptions.combine(this.error, t);
        this.drain();
    }

    drain() : void {
        if (this.wip++ == 0) {
            this.drainLoop();
        }
    }

    private drainLoop() : void {
        let missed = this.wip;

        const b = this.subscribers;
        const a = this.mActual;

        for (;;) {
            if (this.checkTerminated()) {
                return;
            }

            const r = this.requested;
            let e = 0;
            let requestMain = 0;

            const sq = this.scalarQueue;
            if (sq != null) {
                while (e != r) {
                    const v = sq.poll();
                    if (v == null) {
                        break;
                    }

                    a.onNext(v);

                    if (this.checkTerminated()) {
                        return;
                    }

                    e++;
                    requestMain++;
                }
            }

            let n = b.length;
            if (n != 0) {
                let i = this.mIndex;
                if (i >= n) {
                    i = 0;
                }

                for (let j = 0; j < n; j++) {
                    const inner = b[i];
                    const q = inner.queue;

                    while (e != r) {
                        const v = q.poll();
                        if (v == null) {
                            break;
                        }

                        a.onNext(v);

                        if (this.checkTerminated()) {
                            return;
                        }

                        e++;
                        inner.requestOne();
                    }

                    if (inner.done && q.isEmpty()) {
                        b.splice(i, 1);
                        n--;
                        j--;
                        requestMain++;
                        if (i >= n) {
                            i = 0;
                        }
                        if (n == 0) {
                            break;
                        }
                    } else
                    if (++i >= n) {
                        i = 0;
                    }
                }
                this.mIndex = i;
            }

            if (e != 0 && this.requested != Infinity) {
                this.requested -= e;
            }

            if (this.checkTerminated()) {
                return;
            }

            if (requestMain != 0) {
                this.replenish(requestMain);
            }

            this.wip -= missed;
            if (this.wip == 0) {
                break;
            }
            missed = this.wip;
        }
    }

    private cleanup() : void {
        this.scalarQueue = null;
        for (const inner of this.subscribers) {
            inner.cancel();
        }
        this.subscribers.length = 0;
    }

    private checkTerminated() : boolean {
        if (this.cancelled) {
            this.cleanup();
            return true;
        }

        const ex = this.error;
        if (ex != null) {
            this.terminated = true;
            this.cancelled = true;
            this.s.cancel();
            this.cleanup();
            this.mActual.onError(ex);
            return true;
        }

        if (this.done && this.subscribers.length == 0) {
            const sq = this.scalarQueue;
            if (sq == null || sq.isEmpty()) {
                this.terminated = true;
                this.cancelled = true;
                this.mActual.onComplete();
                return true;
            }
        }

        return false;
    }
}

class FlatMapInnerSubscriber<T, R> implements rs.Subscriber<R> {

    readonly queue: flow.Queue<R>;

    private s: rs.Subscription = sp.SH.UNSET;

    private produced : number = 0;

    private limit : number;

    done: boolean = false;

    constructor(private mParent: FlatMapSubscriber<T, R>, private mPrefetch: number) {
        this.limit = mPrefetch - (mPrefetch >> 2);
        this.queue = new util.SpscArrayQueue<R>(mPrefetch);
    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            s.request(this.mPrefetch);
        }
    }

    onNext(t: R) : void {
        if (this.done) {
            return;
        }
        if (!this.queue.offer(t)) {
            this.s.cancel();
            this.mParent.innerError(this, Exceptions.lackOfRequests("inner value"));
            return;
        }
        this.mParent.drain();
    }

    onError(t: Error) : void {
        this.mParent.innerError(this, t);
    }

    onComplete() : void {
        this.done = true;
        this.mParent.drain();
    }

    requestOne() : void {
        const p = this.produced + 1;
        if (p == this.limit) {
            this.produced = 0;
            this.s.request(p);
        } else {
            this.produced = p;
        }
    }

    cancel() : void {
        const a = this.s;
        this.s = sp.SH.CANCELLED;
        a.cancel();
    }
}
