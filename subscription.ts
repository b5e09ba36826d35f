import * as rs from './reactive-streams';
import { Hooks } from './hooks';
import { addCap } from './util';

class CancelledSubscription implements rs.Subscription {
    request(n: number) : void {
        // deliberately ignored
    }

    cancel() : void {
        // deliberately ignored
    }
}

class UnsetSubscription implements rs.Subscription {
    request(n: number) : void {
        // deliberately ignored
    }

    cancel() : void {
        // deliberately ignored
    }
}

export class EmptySubscription implements rs.Subscription {
    request(n: number) : void {
        // deliberately ignored
    }

    cancel() : void {
        // deliberately ignored
    }

    static complete(s : rs.Subscriber<unknown>) : void {
        s.onSubscribe(EmptySubscription.INSTANCE);
        s.onComplete();
    }

    static error(s : rs.Subscriber<unknown>, e : Error) : void {
        s.onSubscribe(EmptySubscription.INSTANCE);
        s.onError(e);
    }

    public static INSTANCE : rs.Subscription = new EmptySubscription();
}

/** Emits a single, already known value on the first valid request. */
export class ScalarSubscription<T> implements rs.Subscription {
    private mActual : rs.Subscriber<T>;
    private mValue : T;
    private once : boolean;

    constructor(value: T, actual: rs.Subscriber<T>) {
        this.mValue = value;
        this.mActual = actual;
        this.once = false;
    }

    request(n : number) {
        if (SH.validRequest(n)) {
            if (!this.once) {
                this.once = true;

                this.mActual.onNext(this.mValue);
                this.mActual.onComplete();
            }
        }
    }

    cancel() {
        this.once = true;
    }
}

enum DeferredState {
    NO_REQUEST_NO_VALUE,
    HAS_REQUEST_NO_VALUE,
    NO_REQUEST_HAS_VALUE,
    HAS_REQUEST_HAS_VALUE,
    CANCELLED,
}

/**
 * Emits a single value that becomes available some time after subscription,
 * waiting for both the value and the first request.
 */
export class DeferredScalarSubscription<T> implements rs.Subscription {
    private mActual: rs.Subscriber<T>;
    private mValue: T | null;
    private mState: DeferredState;

    constructor(actual: rs.Subscriber<T>) {
        this.mActual = actual;
        this.mValue = null;
        this.mState = DeferredState.NO_REQUEST_NO_VALUE;
    }

    public complete(t: T) {
        const s = this.mState;
        if (s == DeferredState.HAS_REQUEST_NO_VALUE) {
            this.mState = DeferredState.HAS_REQUEST_HAS_VALUE;

            this.mActual.onNext(t);
            if (this.mState != DeferredState.CANCELLED) {
                this.mActual.onComplete();
            }
        } else
        if (s == DeferredState.NO_REQUEST_NO_VALUE) {
            this.mValue = t;
            this.mState = DeferredState.NO_REQUEST_HAS_VALUE;
        }
    }

    request(n: number) : void {
        if (SH.validRequest(n)) {
            const s = this.mState;
            if (s == DeferredState.NO_REQUEST_HAS_VALUE) {
                this.mState = DeferredState.HAS_REQUEST_HAS_VALUE;
                const v = this.mValue;
                this.mValue = null;
                if (v != null) {
                    this.mActual.onNext(v);
                }
                if (this.mState != DeferredState.CANCELLED) {
                    this.mActual.onComplete();
                }
            } else
            if (s == DeferredState.NO_REQUEST_NO_VALUE) {
                this.mState = DeferredState.HAS_REQUEST_NO_VALUE;
            }
        }
    }

    cancel() : void {
        this.mState = DeferredState.CANCELLED;
        this.mValue = null;
    }

    isCancelled() : boolean {
        return this.mState == DeferredState.CANCELLED;
    }
}

/**
 * Stands in for an upstream Subscription that may be replaced over time
 * (a fallback source, a delayed subscription). Accumulated demand is
 * replayed to each newly set Subscription.
 */
export class SubscriptionArbiter implements rs.Subscription {
    private current : rs.Subscription | null = null;

    private requested : number = 0;

    private cancelled : boolean = false;

    set(s: rs.Subscription) : void {
        if (this.cancelled) {
            s.cancel();
            return;
        }
        this.current = s;
        const r = this.requested;
        if (r != 0) {
            s.request(r);
        }
    }

    request(n: number) : void {
        if (SH.validRequest(n)) {
            this.requested = addCap(this.requested, n);
            const a = this.current;
            if (a != null) {
                a.request(n);
            }
        }
    }

    /** Accounts for items delivered by the current Subscription. */
    produced(n: number) : void {
        const r = this.requested;
        if (r != Infinity) {
            this.requested = Math.max(0, r - n);
        }
    }

    outstanding() : number {
        return this.requested;
    }

    cancel() : void {
        if (!this.cancelled) {
            this.cancelled = true;
            const a = this.current;
            this.current = null;
            if (a != null) {
                a.cancel();
            }
        }
    }

    isCancelled() : boolean {
        return this.cancelled;
    }
}

/** Subscription helpers. */
export class SH {
    static validRequest(n: number) : boolean {
        if (!(n > 0)) {
            throw new Error("n > 0 required but it was " + n);
        }
        return true;
    }

    /** Validates a freshly received Subscription against the current slot, cancelling duplicates. */
    static validSubscription(current: rs.Subscription, s: rs.Subscription) : boolean {
        if (current != SH.UNSET) {
            s.cancel();
            if (current != SH.CANCELLED) {
                Hooks.errorDropped(new Error("Subscription already set!"));
            }
            return false;
        }
        return true;
    }

    /** Placeholder for a Subscription that has not arrived yet. */
    static UNSET : rs.Subscription = new UnsetSubscription();

    static CANCELLED : rs.Subscription = new CancelledSubscription();

    static TERMINAL_ERROR = new Error("Terminated");
}
