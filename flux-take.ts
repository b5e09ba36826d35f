import * as rs from './reactive-streams';
import * as sp from './subscription';
import { ComputationError } from './errors';
import { Hooks } from './hooks';

/**
 * Relays the first `n` values then cancels upstream and completes. The
 * demand forwarded upstream never exceeds `n` in total.
 */
export class FluxTakeSubscriber<T> implements rs.Subscriber<T>, rs.Subscription {
    private mActual: rs.Subscriber<T>;
    private mRemaining : number;
    private mUnrequested : number;
    private s: rs.Subscription;
    private done: boolean;

    constructor(n: number, actual: rs.Subscriber<T>) {
        this.mActual = actual;
        this.mRemaining = n;
        this.mUnrequested = n;
        this.s = sp.SH.UNSET;
        this.done = false;
    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;
            if (this.mRemaining == 0) {
                this.done = true;
                s.cancel();
                sp.EmptySubscription.complete(this.mActual);
                return;
            }
            this.mActual.onSubscribe(this);
        }
    }

    onNext(t: T) {
        if (this.done) {
            return;
        }

        const r = --this.mRemaining;

        this.mActual.onNext(t);

        if (r == 0 && !this.done) {
            this.done = true;
            this.s.cancel();
            this.mActual.onComplete();
        }
    }

    onError(t: Error) {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.done = true;
        this.mActual.onError(t);
    }

    onComplete() {
        if (this.done) {
            return;
        }
        this.done = true;
        this.mActual.onComplete();
    }

    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            const u = this.mUnrequested;
            if (u == 0) {
                return;
            }
            const m = Math.min(n, u);
            this.mUnrequested = u - m;
            this.s.request(m);
        }
    }

    cancel() {
        this.s.cancel();
    }
}

/** Drops the first `n` values, requesting them from upstream on top of downstream demand. */
export class FluxSkipSubscriber<T> implements rs.Subscriber<T>, rs.Subscription {
    private s: rs.Subscription = sp.SH.UNSET;
    private remaining : number;

    constructor(private actual: rs.Subscriber<T>, private n : number) {
        this.remaining = n;
    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.actual.onSubscribe(this);

            if (this.n != 0) {
                s.request(this.n);
            }
        }
    }

    onNext(t: T) : void {
        if (this.remaining != 0) {
            this.remaining--;
            return;
        }
        this.actual.onNext(t);
    }

    onError(t: Error) : void {
        this.actual.onError(t);
    }

    onComplete() : void {
        this.actual.onComplete();
    }

    request(n: number) {
        this.s.request(n);
    }

    cancel() : void {
        this.s.cancel();
    }
}

/** Relays values while the predicate holds; the first failing value completes the sequence and is not emitted. */
export class FluxTakeWhileSubscriber<T> implements rs.Subscriber<T>, rs.Subscription {
    private s: rs.Subscription = sp.SH.UNSET;
    private done: boolean = false;

    constructor(private actual: rs.Subscriber<T>, private predicate: (t: T) => boolean) {

    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.actual.onSubscribe(this);
        }
    }

    onNext(t: T) : void {
        if (this.done) {
            return;
        }

        let b : boolean;
        try {
            b = this.predicate(t);
        } catch (ex) {
            this.s.cancel();
            this.onError(ComputationError.wrap(ex));
            return;
        }

        if (!b) {
            this.done = true;
            this.s.cancel();
            this.actual.onComplete();
            return;
        }

        this.actual.onNext(t);
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.done = true;
        this.actual.onError(t);
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        this.actual.onComplete();
    }

    request(n: number) {
        this.s.request(n);
    }

    cancel() : void {
        this.s.cancel();
    }
}
