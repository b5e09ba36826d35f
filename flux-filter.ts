import * as rs from './reactive-streams';
import * as sp from './subscription';
import * as flow from './flow';
import { ComputationError } from './errors';
import { Hooks } from './hooks';

export class FluxFilterSubscriber<T> implements flow.ConditionalSubscriber<T>, rs.Subscription {
    private mActual : rs.Subscriber<T>;
    private mPredicate : (t: T) => boolean;

    private s : rs.Subscription = sp.SH.UNSET;
    private done : boolean = false;

    constructor(actual : rs.Subscriber<T>, predicate: (t: T) => boolean) {
        this.mActual = actual;
        this.mPredicate = predicate;
    }

    onSubscribe(s: rs.Subscription) {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.mActual.onSubscribe(this);
        }
    }

    onNext(t: T) {
        if (!this.tryOnNext(t)) {
            this.s.request(1);
        }
    }

    tryOnNext(t: T) : boolean {
        if (this.done) {
            return true;
        }

        let v : boolean;
        try {
            v = this.mPredicate(t);
        } catch (ex) {
            this.s.cancel();
            this.onError(ComputationError.wrap(ex));
            return true;
        }

        if (v) {
            this.mActual.onNext(t);
            return true;
        }
        return false;
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

    request(n : number) {
        this.s.request(n);
    }

    cancel() {
        this.s.cancel();
    }
}

/**
 * Drops values whose key has been seen before by this subscriber. Keys are
 * compared with SameValueZero, so object keys match by identity.
 */
export class FluxDistinctSubscriber<T, K> implements flow.ConditionalSubscriber<T>, rs.Subscription {
    private s : rs.Subscription = sp.SH.UNSET;
    private done : boolean = false;

    private seen = new Set<K>();

    constructor(private mActual : rs.Subscriber<T>, private mKeySelector : (t: T) => K) {

    }

    onSubscribe(s: rs.Subscription) {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.mActual.onSubscribe(this);
        }
    }

    onNext(t: T) {
        if (!this.tryOnNext(t)) {
            this.s.request(1);
        }
    }

    tryOnNext(t: T) : boolean {
        if (this.done) {
            return true;
        }

        let k : K;
        try {
            k = this.mKeySelector(t);
        } catch (ex) {
            this.s.cancel();
            this.onError(ComputationError.wrap(ex));
            return true;
        }

        if (this.seen.has(k)) {
            return false;
        }
        this.seen.add(k);
        this.mActual.onNext(t);
        return true;
    }

    onError(t: Error) {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.done = true;
        this.seen.clear();
        this.mActual.onError(t);
    }

    onComplete() {
        if (this.done) {
            return;
        }
        this.done = true;
        this.seen.clear();
        this.mActual.onComplete();
    }

    request(n : number) {
        this.s.request(n);
    }

    cancel() {
        this.seen.clear();
        this.s.cancel();
    }
}
