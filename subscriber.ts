import * as rs from './reactive-streams';
import * as flow from './flow';
import * as sp from './subscription';
import { Exceptions } from './errors';
import { Hooks } from './hooks';

/** Lifecycle of a consuming end; the three terminal states absorb every further signal. */
export enum SubscriberState {
    UNSUBSCRIBED = 'unsubscribed',
    ACTIVE = 'active',
    COMPLETED = 'completed',
    ERRORED = 'errored',
    CANCELLED = 'cancelled',
}

/** Consumes a sequence through callbacks, requesting everything upfront. */
export class LambdaSubscriber<T> implements rs.Subscriber<T>, flow.Disposable {
    private mOnNext : (t: T) => void;
    private mOnError : (t: Error) => void;
    private mOnComplete : () => void;

    private mState : SubscriberState;
    private s : rs.Subscription;

    constructor(onNext : (t: T) => void, onError : (t: Error) => void, onComplete : () => void) {
        this.mOnNext = onNext;
        this.mOnError = onError;
        this.mOnComplete = onComplete;
        this.mState = SubscriberState.UNSUBSCRIBED;
        this.s = sp.SH.UNSET;
    }

    get state() : SubscriberState {
        return this.mState;
    }

    onSubscribe(s: rs.Subscription) : void {
        if (this.mState == SubscriberState.CANCELLED) {
            s.cancel();
            return;
        }
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;
            this.mState = SubscriberState.ACTIVE;
            s.request(Infinity);
        }
    }

    onNext(t: T) : void {
        if (this.mState != SubscriberState.ACTIVE) {
            Hooks.nextDropped(t);
            return;
        }
        try {
            this.mOnNext(t);
        } catch (ex) {
            this.s.cancel();
            this.onError(Exceptions.propagate(ex));
        }
    }

    onError(t: Error) : void {
        if (this.mState != SubscriberState.ACTIVE && this.mState != SubscriberState.UNSUBSCRIBED) {
            Hooks.errorDropped(t);
            return;
        }
        this.mState = SubscriberState.ERRORED;
        try {
            this.mOnError(t);
        } catch (ex) {
            Hooks.errorDropped(Exceptions.combine(t, Exceptions.propagate(ex)));
        }
    }

    onComplete() : void {
        if (this.mState != SubscriberState.ACTIVE && this.mState != SubscriberState.UNSUBSCRIBED) {
            return;
        }
        this.mState = SubscriberState.COMPLETED;
        try {
            this.mOnComplete();
        } catch (ex) {
            Hooks.errorDropped(Exceptions.propagate(ex));
        }
    }

    dispose() : void {
        const st = this.mState;
        if (st == SubscriberState.ACTIVE || st == SubscriberState.UNSUBSCRIBED) {
            this.mState = SubscriberState.CANCELLED;
            const a = this.s;
            this.s = sp.SH.CANCELLED;
            a.cancel();
        }
    }

    isDisposed() : boolean {
        return this.mState != SubscriberState.ACTIVE && this.mState != SubscriberState.UNSUBSCRIBED;
    }
}

/** The default error consumer of subscribe(): errors nobody handles end up in Hooks. */
export function unhandledError(e: Error) : void {
    Hooks.errorDropped(e);
}
