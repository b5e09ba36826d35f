import * as rs from './reactive-streams';
import * as sp from './subscription';
import { ComputationError, Exceptions } from './errors';
import { Hooks } from './hooks';
import { Signal, Signals } from './signal';

export class FluxMapSubscriber<T, R> implements rs.Subscriber<T>, rs.Subscription {
    private mActual : rs.Subscriber<R>;
    private mMapper : (t: T) => R;

    private s : rs.Subscription;
    private done : boolean;

    constructor(actual : rs.Subscriber<R>, mapper : (t: T) => R) {
        this.mActual = actual;
        this.mMapper = mapper;
        this.s = sp.SH.UNSET;
        this.done = false;
    }

    onSubscribe(s: rs.Subscription) {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.mActual.onSubscribe(this);
        }
    }

    onNext(t: T) {
        if (this.done) {
            return;
        }

        let v : R;
        try {
            v = this.mMapper(t);
        } catch (ex) {
            this.s.cancel();
            this.onError(ComputationError.wrap(ex));
            return;
        }

        if (v == null) {
            this.s.cancel();
            this.onError(Exceptions.nullValue("The mapper"));
            return;
        }

        this.mActual.onNext(v);
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

/** Hides the identity of the upstream Subscription (and with it any optimization keyed on it). */
export class FluxHideSubscriber<T> implements rs.Subscriber<T>, rs.Subscription {
    private s: rs.Subscription = sp.SH.UNSET;

    constructor(private mActual: rs.Subscriber<T>) {

    }

    onSubscribe(s: rs.Subscription) {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.mActual.onSubscribe(this);
        }
    }

    onNext(t: T) {
        this.mActual.onNext(t);
    }

    onError(t: Error) {
        this.mActual.onError(t);
    }

    onComplete() {
        this.mActual.onComplete();
    }

    request(n: number) {
        this.s.request(n);
    }

    cancel() {
        this.s.cancel();
    }
}

/** Turns every signal, terminal ones included, into a value followed by completion. */
export class MaterializeSubscriber<T> implements rs.Subscriber<T>, rs.Subscription {
    private s: rs.Subscription = sp.SH.UNSET;

    private requested: number = 0;

    private terminal: Signal<T> | null = null;

    private cancelled: boolean = false;

    constructor(private actual: rs.Subscriber<Signal<T>>) {

    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.actual.onSubscribe(this);
        }
    }

    onNext(t: T) : void {
        if (this.requested != Infinity) {
            this.requested--;
        }
        this.actual.onNext(Signals.next(t));
    }

    onError(t: Error) : void {
        this.terminal = Signals.error<T>(t);
        this.tryEmitTerminal();
    }

    onComplete() : void {
        this.terminal = Signals.complete<T>();
        this.tryEmitTerminal();
    }

    private tryEmitTerminal() : void {
        const t = this.terminal;
        if (t != null && this.requested > 0 && !this.cancelled) {
            this.terminal = null;
            this.cancelled = true;
            this.actual.onNext(t);
            this.actual.onComplete();
        }
    }

    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            this.requested += n;
            if (this.terminal != null) {
                this.tryEmitTerminal();
            } else {
                this.s.request(n);
            }
        }
    }

    cancel() : void {
        this.cancelled = true;
        this.s.cancel();
    }
}
