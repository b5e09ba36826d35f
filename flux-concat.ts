import * as rs from './reactive-streams';
import * as sp from './subscription';
import * as flow from './flow';
import * as util from './util';
import { ComputationError, Exceptions } from './errors';
import { Hooks } from './hooks';

/**
 * Maps each value to an inner Publisher and subscribes to them one at a
 * time, in source order. Downstream demand is carried over from one inner
 * source to the next through a SubscriptionArbiter.
 */
export class ConcatMapSubscriber<T, R> implements rs.Subscriber<T>, rs.Subscription {
    private mQueue: flow.Queue<T>;

    private s: rs.Subscription = sp.SH.UNSET;

    private arbiter: sp.SubscriptionArbiter = new sp.SubscriptionArbiter();

    private active: boolean = false;

    private done: boolean = false;

    private error: Error | null = null;

    private terminated: boolean = false;

    private cancelled: boolean = false;

    private wip: number = 0;

    private consumed : number = 0;
    private limit : number;

    constructor (
            private actual: rs.Subscriber<R>,
            private mapper: (t: T) => rs.Publisher<R>,
            private prefetch: number) {
        this.mQueue = new util.SpscArrayQueue<T>(prefetch);
        this.limit = prefetch - (prefetch >> 2);
    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.actual.onSubscribe(this);

            s.request(this.prefetch);
        }
    }

    onNext(t: T) : void {
        if (this.done) {
            return;
        }
        if (!this.mQueue.offer(t)) {
            this.s.cancel();
            this.onError(Exceptions.lackOfRequests("source value"));
            return;
        }
        this.drain();
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

    request(n : number) : void {
        this.arbiter.request(n);
    }

    cancel() : void {
        if (!this.cancelled) {
            this.cancelled = true;
            this.s.cancel();
            this.arbiter.cancel();
            if (this.wip++ == 0) {
                this.mQueue.clear();
            }
        }
    }

    innerNext(t: R) : void {
        this.actual.onNext(t);
    }

    innerError(t: Error) : void {
        if (this.terminated) {
            Hooks.errorDropped(t);
            return;
        }
        this.error = Exceptions.combine(this.error, t);
        this.active = false;
        this.drain();
    }

    innerComplete(produced: number) : void {
        this.arbiter.produced(produced);
        this.active = false;
        this.drain();
    }

    private drain() : void {
        if (this.wip++ != 0) {
            return;
        }

        let missed = 1;

        for (;;) {
            if (this.cancelled) {
                this.mQueue.clear();
                return;
            }

            const err = this.error;
            if (err != null) {
                this.terminated = true;
                this.cancelled = true;
                this.s.cancel();
                this.arbiter.cancel();
                this.mQueue.clear();
                this.actual.onError(err);
                return;
            }

            if (!this.active) {
                const v = this.mQueue.poll();

                if (v == null) {
                    if (this.done) {
                        this.terminated = true;
                        this.cancelled = true;
                        this.actual.onComplete();
                        return;
                    }
                } else {
                    const c = this.consumed + 1;
                    if (c == this.limit) {
                        this.consumed = 0;
                        this.s.request(c);
                    } else {
                        this.consumed = c;
                    }

                    let p : rs.Publisher<R> | null = null;

                    try {
                        p = this.mapper(v);
                        if (p == null) {
                            this.error = Exceptions.nullValue("The mapper");
                        }
                    } catch (e) {
                        this.error = ComputationError.wrap(e);
                    }

                    if (p != null && this.error == null) {
                        this.active = true;
                        p.subscribe(new ConcatMapInnerSubscriber<T, R>(this, this.arbiter));
                    }
                    continue;
                }
            }

            this.wip -= missed;
            if (this.wip == 0) {
                break;
            }
            missed = this.wip;
        }
    }
}

class ConcatMapInnerSubscriber<T, R> implements rs.Subscriber<R> {

    private produced: number = 0;

    private done: boolean = false;

    constructor(private parent : ConcatMapSubscriber<T, R>, private arbiter: sp.SubscriptionArbiter) {

    }

    onSubscribe(s: rs.Subscription) : void {
        this.arbiter.set(s);
    }

    onNext(t: R) : void {
        if (this.done) {
            return;
        }
        this.produced++;
        this.parent.innerNext(t);
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.done = true;
        this.arbiter.produced(this.produced);
        this.parent.innerError(t);
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        this.parent.innerComplete(this.produced);
    }
}
