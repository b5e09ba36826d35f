import * as rs from './reactive-streams';
import * as flow from './flow';
import * as sp from './subscription';
import * as sch from './scheduler';
import { Exceptions, TimeoutError } from './errors';
import { Hooks } from './hooks';
import { FallbackSubscriber } from './flux-error';

/** Emits 0 once the delay elapses, or fails if nothing has been requested by then. */
export class TimedSubscription implements rs.Subscription {

    private mFuture: flow.SerialDisposable = new flow.SerialDisposable();

    private mRequested : boolean = false;

    constructor(private actual: rs.Subscriber<number>) {

    }

    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            this.mRequested = true;
        }
    }

    cancel() : void {
        this.mFuture.dispose();
    }

    public run = () : void => {
        if (this.mFuture.isDisposed()) {
            return;
        }
        if (this.mRequested) {
            this.actual.onNext(0);
            if (!this.mFuture.isDisposed()) {
                this.mFuture.dispose();
                this.actual.onComplete();
            }
        } else {
            this.mFuture.dispose();
            this.actual.onError(Exceptions.lackOfRequests("the timed value"));
        }
    }

    setFuture(c: flow.Disposable) : void {
        this.mFuture.replace(c);
    }
}

/** Emits 0, 1, 2, ... periodically; a tick without outstanding demand fails the sequence. */
export class PeriodicTimedSubscription implements rs.Subscription {

    private mFuture: flow.SerialDisposable = new flow.SerialDisposable();

    private mRequested : number = 0;

    private mCount: number = 0;

    constructor(private actual: rs.Subscriber<number>) {

    }

    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            this.mRequested += n;
        }
    }

    cancel() : void {
        this.mFuture.dispose();
    }

    public run = () : void => {
        if (this.mFuture.isDisposed()) {
            return;
        }
        if (this.mRequested > 0) {
            if (this.mRequested != Infinity) {
                this.mRequested--;
            }
            this.actual.onNext(this.mCount++);
        } else {
            this.cancel();
            this.actual.onError(Exceptions.lackOfRequests(`tick ${this.mCount}`));
        }
    }

    setFuture(c: flow.Disposable) : void {
        this.mFuture.replace(c);
    }
}

/**
 * Subscribes to the source only once the delay has elapsed; demand issued
 * in the meantime is replayed to the source.
 */
export class DelaySubscriptionSubscriber<T> implements rs.Subscriber<T>, rs.Subscription {

    private arbiter: sp.SubscriptionArbiter = new sp.SubscriptionArbiter();

    private mFuture: flow.SerialDisposable = new flow.SerialDisposable();

    constructor(private actual: rs.Subscriber<T>, private source: rs.Publisher<T>) {

    }

    start(scheduler: sch.TimedScheduler, delay: number) : void {
        this.actual.onSubscribe(this);
        this.mFuture.replace(scheduler.scheduleDelayed(() => {
            if (!this.arbiter.isCancelled()) {
                this.source.subscribe(this);
            }
        }, delay));
    }

    onSubscribe(s: rs.Subscription) : void {
        this.arbiter.set(s);
    }

    onNext(t: T) : void {
        this.actual.onNext(t);
    }

    onError(t: Error) : void {
        this.actual.onError(t);
    }

    onComplete() : void {
        this.actual.onComplete();
    }

    request(n: number) : void {
        this.arbiter.request(n);
    }

    cancel() : void {
        this.mFuture.dispose();
        this.arbiter.cancel();
    }
}

/**
 * Fails with a TimeoutError (or switches to a fallback) when the first
 * value, any subsequent value or the terminal signal does not arrive
 * within `timeout` ms of the previous one (or of subscription).
 */
export class TimeoutSubscriber<T> implements rs.Subscriber<T>, rs.Subscription {

    private arbiter: sp.SubscriptionArbiter = new sp.SubscriptionArbiter();

    private main: rs.Subscription = sp.SH.UNSET;

    private timer: flow.SerialDisposable = new flow.SerialDisposable();

    private index: number = 0;

    private produced: number = 0;

    private done: boolean = false;

    private subscribed: boolean = false;

    constructor(private actual: rs.Subscriber<T>, private timeout: number,
            private worker: sch.TimedWorker, private fallback: rs.Publisher<T> | null) {

    }

    onSubscribe(s: rs.Subscription) : void {
        if (this.subscribed) {
            s.cancel();
            Hooks.errorDropped(new Error("Subscription already set!"));
            return;
        }
        this.subscribed = true;
        this.main = s;
        this.arbiter.set(s);

        this.schedule(0);

        this.actual.onSubscribe(this);
    }

    private schedule(idx: number) : void {
        this.timer.replace(this.worker.scheduleDelayed(() => this.fire(idx), this.timeout));
    }

    private fire(idx: number) : void {
        if (this.done || idx != this.index) {
            return;
        }
        this.done = true;
        this.worker.shutdown();
        this.main.cancel();

        const f = this.fallback;
        if (f == null) {
            this.arbiter.cancel();
            this.actual.onError(new TimeoutError(this.timeout));
            return;
        }
        this.arbiter.produced(this.produced);
        f.subscribe(new FallbackSubscriber<T>(this.arbiter, this.actual));
    }

    onNext(t: T) : void {
        if (this.done) {
            return;
        }
        const idx = ++this.index;
        this.produced++;

        this.actual.onNext(t);

        if (!this.done) {
            this.schedule(idx);
        }
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.done = true;
        this.worker.shutdown();
        this.actual.onError(t);
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        this.worker.shutdown();
        this.actual.onComplete();
    }

    request(n: number) : void {
        this.arbiter.request(n);
    }

    cancel() : void {
        this.worker.shutdown();
        this.arbiter.cancel();
    }
}
