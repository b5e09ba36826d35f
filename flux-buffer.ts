import * as rs from './reactive-streams';
import * as sp from './subscription';
import * as util from './util';
import { Hooks } from './hooks';

/** Gathers values into arrays of `size`; the last array may be shorter. */
export class BufferSubscriber<T> implements rs.Subscriber<T>, rs.Subscription {

    private s: rs.Subscription = sp.SH.UNSET;

    private buffer: T[] = [];

    private done: boolean = false;

    constructor(private actual: rs.Subscriber<T[]>, private size: number) {

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
        const b = this.buffer;
        b.push(t);
        if (b.length == this.size) {
            this.buffer = [];
            this.actual.onNext(b);
        }
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.done = true;
        this.buffer = [];
        this.actual.onError(t);
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        const b = this.buffer;
        this.buffer = [];
        if (b.length != 0) {
            this.actual.onNext(b);
        }
        this.actual.onComplete();
    }

    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            this.s.request(util.multiplyCap(n, this.size));
        }
    }

    cancel() : void {
        this.buffer = [];
        this.s.cancel();
    }
}

/**
 * Splits the values into consecutive windows of `size`, each one a fresh
 * Processor emitted before its first value is pushed into it. Cancelling
 * the outer sequence lets the open window run to its end.
 */
export class WindowSubscriber<T, W extends rs.Processor<T, T>> implements rs.Subscriber<T>, rs.Subscription {

    private s: rs.Subscription = sp.SH.UNSET;

    private window: W | null = null;

    private count: number = 0;

    private done: boolean = false;

    private cancelled: boolean = false;

    constructor(private actual: rs.Subscriber<W>, private size: number, private newWindow: () => W) {

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
        let w = this.window;
        if (w == null) {
            if (this.cancelled) {
                return;
            }
            w = this.newWindow();
            this.window = w;
            this.count = 0;
            this.actual.onNext(w);
        }

        w.onNext(t);

        if (++this.count == this.size) {
            this.window = null;
            w.onComplete();
            if (this.cancelled) {
                this.s.cancel();
            }
        }
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.done = true;
        const w = this.window;
        this.window = null;
        if (w != null) {
            w.onError(t);
        }
        this.actual.onError(t);
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        const w = this.window;
        this.window = null;
        if (w != null) {
            w.onComplete();
        }
        this.actual.onComplete();
    }

    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            this.s.request(util.multiplyCap(n, this.size));
        }
    }

    cancel() : void {
        if (!this.cancelled) {
            this.cancelled = true;
            if (this.window == null) {
                this.s.cancel();
            }
        }
    }
}
