import * as rs from './reactive-streams';
import * as sp from './subscription';
import { ComputationError, Exceptions } from './errors';
import { Hooks } from './hooks';

/** Side-effect callbacks peeking at the signals passing through. All of them are optional. */
export interface LifecycleCallbacks<T> {
    onSubscribe?: (s: rs.Subscription) => void;
    onNext?: (t: T) => void;
    onAfterNext?: (t: T) => void;
    onError?: (t: Error) => void;
    onComplete?: () => void;
    onAfterTerminate?: () => void;
    onRequest?: (n: number) => void;
    onCancel?: () => void;
}

export class DoOnLifecycle<T> implements rs.Subscriber<T>, rs.Subscription {

    private s: rs.Subscription = sp.SH.UNSET;

    private done: boolean = false;

    constructor(private actual: rs.Subscriber<T>, private callbacks: LifecycleCallbacks<T>) {

    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            const f = this.callbacks.onSubscribe;
            if (f !== undefined) {
                try {
                    f(s);
                } catch (ex) {
                    this.done = true;
                    s.cancel();
                    sp.EmptySubscription.error(this.actual, ComputationError.wrap(ex));
                    return;
                }
            }

            this.actual.onSubscribe(this);
        }
    }

    onNext(t: T) : void {
        if (this.done) {
            return;
        }
        const f = this.callbacks.onNext;
        if (f !== undefined) {
            try {
                f(t);
            } catch (ex) {
                this.s.cancel();
                this.onError(ComputationError.wrap(ex));
                return;
            }
        }

        this.actual.onNext(t);

        const g = this.callbacks.onAfterNext;
        if (g !== undefined) {
            try {
                g(t);
            } catch (ex) {
                this.s.cancel();
                this.onError(ComputationError.wrap(ex));
            }
        }
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.done = true;

        const f = this.callbacks.onError;
        if (f !== undefined) {
            try {
                f(t);
            } catch (ex) {
                t = Exceptions.combine(t, ComputationError.wrap(ex));
            }
        }

        this.actual.onError(t);

        this.afterTerminate();
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;

        const f = this.callbacks.onComplete;
        if (f !== undefined) {
            try {
                f();
            } catch (ex) {
                this.actual.onError(ComputationError.wrap(ex));
                this.afterTerminate();
                return;
            }
        }

        this.actual.onComplete();

        this.afterTerminate();
    }

    private afterTerminate() : void {
        const f = this.callbacks.onAfterTerminate;
        if (f !== undefined) {
            try {
                f();
            } catch (ex) {
                Hooks.errorDropped(Exceptions.propagate(ex));
            }
        }
    }

    request(n: number) : void {
        const f = this.callbacks.onRequest;
        if (f !== undefined) {
            try {
                f(n);
            } catch (ex) {
                Hooks.errorDropped(Exceptions.propagate(ex));
            }
        }
        this.s.request(n);
    }

    cancel() : void {
        const f = this.callbacks.onCancel;
        if (f !== undefined) {
            try {
                f();
            } catch (ex) {
                Hooks.errorDropped(Exceptions.propagate(ex));
            }
        }
        this.s.cancel();
    }
}
