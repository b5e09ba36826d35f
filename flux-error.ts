import * as rs from './reactive-streams';
import * as sp from './subscription';
import { ComputationError, type ErrorKind, Exceptions } from './errors';
import { Hooks } from './hooks';

/**
 * Fallbacks keyed by error kind. An error whose kind has no entry goes to
 * `otherwise`; without that entry it propagates unchanged.
 */
export type ErrorDispatchTable<T> = {
    readonly [K in ErrorKind]?: (e: Error) => rs.Publisher<T>;
} & {
    readonly otherwise?: (e: Error) => rs.Publisher<T>;
};

export type ErrorResumeHandler<T> = ((e: Error) => rs.Publisher<T>) | ErrorDispatchTable<T>;

/** Picks the fallback function for an error, or null when the error should propagate. */
export function selectFallback<T>(handler: ErrorResumeHandler<T>, e: Error) : ((e: Error) => rs.Publisher<T>) | null {
    if (typeof handler === 'function') {
        return handler;
    }
    return handler[Exceptions.kindOf(e)] ?? handler.otherwise ?? null;
}

/** Replaces an error (optionally only one of the given kind) with a final value and completion. */
export class OnErrorReturnSubscriber<T> implements rs.Subscriber<T>, rs.Subscription {

    private done: boolean = false;
    private requested: number = 0;
    private s: rs.Subscription = sp.SH.UNSET;

    constructor(private actual: rs.Subscriber<T>, private value: T, private kind?: ErrorKind) {

    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.actual.onSubscribe(this);
        }
    }

    onNext(t: T) : void {
        const p = this.requested;
        if (p != Infinity) {
            this.requested = p - 1;
        }
        this.actual.onNext(t);
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        if (this.kind !== undefined && Exceptions.kindOf(t) != this.kind) {
            this.done = true;
            this.requested = -1;
            this.actual.onError(t);
            return;
        }
        this.done = true;
        if (this.requested > 0) {
            this.requested = -1;
            this.actual.onNext(this.value);
            this.actual.onComplete();
        }
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        this.requested = -1;
        this.actual.onComplete();
    }

    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            if (this.done) {
                if (this.requested == 0) {
                    this.requested = -1;
                    this.actual.onNext(this.value);
                    this.actual.onComplete();
                }
            } else {
                this.requested += n;
                this.s.request(n);
            }
        }
    }

    cancel() : void {
        this.requested = -1;
        this.s.cancel();
    }
}

/**
 * Switches to a fallback Publisher chosen from the error. Outstanding
 * demand carries over to the fallback; an error of the fallback itself
 * is relayed as is.
 */
export class OnErrorResumeSubscriber<T> implements rs.Subscriber<T>, rs.Subscription {
    private arbiter: sp.SubscriptionArbiter = new sp.SubscriptionArbiter();
    private produced: number = 0;
    private subscribed: boolean = false;
    private resumed: boolean = false;

    constructor(private actual: rs.Subscriber<T>, private handler: ErrorResumeHandler<T>) {

    }

    onSubscribe(s: rs.Subscription) : void {
        if (this.subscribed) {
            s.cancel();
            Hooks.errorDropped(new Error("Subscription already set!"));
            return;
        }
        this.subscribed = true;
        this.arbiter.set(s);

        this.actual.onSubscribe(this);
    }

    onNext(t: T) : void {
        this.produced++;
        this.actual.onNext(t);
    }

    onError(t: Error) : void {
        if (this.resumed) {
            Hooks.errorDropped(t);
            return;
        }
        this.resumed = true;

        const f = selectFallback(this.handler, t);
        if (f == null) {
            this.actual.onError(t);
            return;
        }

        let p : rs.Publisher<T>;

        try {
            p = f(t);
        } catch (ex) {
            this.actual.onError(ComputationError.wrap(ex));
            return;
        }

        if (p == null) {
            this.actual.onError(Exceptions.nullValue("The fallback function"));
            return;
        }

        if (!this.arbiter.isCancelled()) {
            this.arbiter.produced(this.produced);
            this.produced = 0;

            p.subscribe(new FallbackSubscriber<T>(this.arbiter, this.actual));
        }
    }

    onComplete() : void {
        if (this.resumed) {
            return;
        }
        this.actual.onComplete();
    }

    request(n: number) : void {
        this.arbiter.request(n);
    }

    cancel() : void {
        this.arbiter.cancel();
    }
}

/** Relays a replacement source, routing its Subscription through the arbiter that holds the outstanding demand. */
export class FallbackSubscriber<T> implements rs.Subscriber<T> {
    constructor(private arbiter: sp.SubscriptionArbiter, private actual: rs.Subscriber<T>) {

    }

    onSubscribe(s: rs.Subscription) : void {
        this.arbiter.set(s);
    }

    onNext(t: T): void {
        this.actual.onNext(t);
    }

    onError(t: Error) : void {
        this.actual.onError(t);
    }

    onComplete() : void {
        this.actual.onComplete();
    }
}
