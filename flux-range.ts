import * as rs from './reactive-streams';
import * as sp from './subscription';
import { Exceptions } from './errors';

/** Emits the integers of `[start, end)` honouring backpressure. */
export class FluxRangeSubscription implements rs.Subscription {
    private mActual : rs.Subscriber<number>;
    private mEnd : number;
    private requested : number;
    private mIndex : number;
    private cancelled : boolean;

    constructor(start: number, end: number, actual: rs.Subscriber<number>) {
        this.mActual = actual;
        this.mIndex = start;
        this.mEnd = end;
        this.requested = 0;
        this.cancelled = false;
    }

    request(n : number) : void {
        if (!sp.SH.validRequest(n)) {
            return;
        }
        let r = this.requested;
        this.requested = r + n;

        if (r != 0) {
            return;
        }

        const f = this.mEnd;
        const a = this.mActual;
        let i = this.mIndex;

        if (n >= f - i) {
            for ( ; i != f; i++) {
                if (this.cancelled) {
                    return;
                }
                a.onNext(i);
            }
            this.mIndex = f;
            if (!this.cancelled) {
                a.onComplete();
            }
            return;
        }

        r = n;
        let e = 0;

        for (;;) {
            if (this.cancelled) {
                return;
            }

            while (e != r && i != f) {
                a.onNext(i);

                if (this.cancelled) {
                    return;
                }

                i++;
                e++;
            }

            if (i == f) {
                this.mIndex = f;
                a.onComplete();
                return;
            }

            n = this.requested;
            if (r == n) {
                this.mIndex = i;
                this.requested = 0;
                return;
            }
            r = n;
        }
    }

    cancel() : void {
        this.cancelled = true;
    }
}

/** Emits the elements of an array honouring backpressure; a null element is an error. */
export class FluxArraySubscription<T> implements rs.Subscription {
    private mActual: rs.Subscriber<T>;
    private mArray: ReadonlyArray<T>;
    private mIndex: number;
    private requested: number;
    private cancelled: boolean;

    constructor(array: ReadonlyArray<T>, actual: rs.Subscriber<T>) {
        this.mActual = actual;
        this.mArray = array;
        this.mIndex = 0;
        this.requested = 0;
        this.cancelled = false;
    }

    request(n: number) : void {
        if (!sp.SH.validRequest(n)) {
            return;
        }
        let r = this.requested;
        this.requested = r + n;
        if (r != 0) {
            return;
        }

        r = n;
        let e = 0;
        let i = this.mIndex;
        const b = this.mArray;
        const f = b.length;
        const a = this.mActual;

        for (;;) {
            if (this.cancelled) {
                return;
            }

            while (e != r && i != f) {
                const v = b[i];

                if (v == null) {
                    this.cancelled = true;
                    a.onError(Exceptions.nullValue(`The ${i}th element`));
                    return;
                }

                a.onNext(v);

                if (this.cancelled) {
                    return;
                }

                i++;
                e++;
            }

            if (this.cancelled) {
                return;
            }

            if (i == f) {
                this.mIndex = f;
                a.onComplete();
                return;
            }

            n = this.requested;
            if (r == n) {
                this.mIndex = i;
                this.requested = 0;
                return;
            }
            r = n;
        }
    }

    cancel() : void {
        this.cancelled = true;
    }
}
