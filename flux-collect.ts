import * as rs from './reactive-streams';
import * as sp from './subscription';
import { ComputationError, Exceptions } from './errors';
import { Hooks } from './hooks';

/** Accumulates every value into a container handed out on completion. */
export class CollectSubscriber<T, U> extends sp.DeferredScalarSubscription<U>
implements rs.Subscriber<T>, rs.Subscription {

    private s: rs.Subscription = sp.SH.UNSET;

    private done: boolean = false;

    constructor(private actual: rs.Subscriber<U>, private collection: U, private collector: (u: U, t: T) => void) {
        super(actual);
    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.actual.onSubscribe(this);

            s.request(Infinity);
        }
    }

    onNext(t: T) : void {
        if (this.done) {
            return;
        }
        try {
            this.collector(this.collection, t);
        } catch (ex) {
            this.s.cancel();
            this.onError(ComputationError.wrap(ex));
        }
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
        super.complete(this.collection);
    }

    request(n: number) : void {
        super.request(n);
    }

    cancel() : void {
        super.cancel();
        this.s.cancel();
    }
}

/** Folds the values into an accumulator starting from a seed. */
export class ReduceSubscriber<T, U> extends sp.DeferredScalarSubscription<U>
implements rs.Subscriber<T>, rs.Subscription {

    private s: rs.Subscription = sp.SH.UNSET;

    private done: boolean = false;

    constructor(private actual: rs.Subscriber<U>, private accumulator: U, private reducer: (u: U, t: T) => U) {
        super(actual);
    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.actual.onSubscribe(this);

            s.request(Infinity);
        }
    }

    onNext(t: T) : void {
        if (this.done) {
            return;
        }

        let u : U;
        try {
            u = this.reducer(this.accumulator, t);
        } catch (ex) {
            this.s.cancel();
            this.onError(ComputationError.wrap(ex));
            return;
        }

        if (u == null) {
            this.s.cancel();
            this.onError(Exceptions.nullValue("The reducer"));
            return;
        }
        this.accumulator = u;
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
        super.complete(this.accumulator);
    }

    request(n: number) : void {
        super.request(n);
    }

    cancel() : void {
        super.cancel();
        this.s.cancel();
    }
}

/** Folds the values pairwise; an empty source yields an empty result. */
export class ReduceFirstSubscriber<T> extends sp.DeferredScalarSubscription<T>
implements rs.Subscriber<T>, rs.Subscription {

    private s: rs.Subscription = sp.SH.UNSET;

    private done: boolean = false;

    private value: T | null = null;

    constructor(private actual: rs.Subscriber<T>, private reducer: (a: T, b: T) => T) {
        super(actual);
    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.actual.onSubscribe(this);

            s.request(Infinity);
        }
    }

    onNext(t: T) : void {
        if (this.done) {
            return;
        }

        const a = this.value;
        if (a == null) {
            this.value = t;
            return;
        }

        let v : T;
        try {
            v = this.reducer(a, t);
        } catch (ex) {
            this.s.cancel();
            this.onError(ComputationError.wrap(ex));
            return;
        }

        if (v == null) {
            this.s.cancel();
            this.onError(Exceptions.nullValue("The reducer"));
            return;
        }
        this.value = v;
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.done = true;
        this.value = null;
        this.actual.onError(t);
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        const v = this.value;
        if (v == null) {
            this.actual.onComplete();
        } else {
            this.value = null;
            super.complete(v);
        }
    }

    request(n: number) : void {
        super.request(n);
    }

    cancel() : void {
        super.cancel();
        this.s.cancel();
    }
}

/** Relays the first value only, cancelling the source right after it. */
export class NextSubscriber<T> extends sp.DeferredScalarSubscription<T>
implements rs.Subscriber<T>, rs.Subscription {

    private s: rs.Subscription = sp.SH.UNSET;

    private done: boolean = false;

    constructor(private actual: rs.Subscriber<T>) {
        super(actual);
    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.actual.onSubscribe(this);

            s.request(Infinity);
        }
    }

    onNext(t: T) : void {
        if (this.done) {
            return;
        }
        this.done = true;
        this.s.cancel();
        super.complete(t);
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

    request(n: number) : void {
        super.request(n);
    }

    cancel() : void {
        super.cancel();
        this.s.cancel();
    }
}
