import * as rs from './reactive-streams';

/** A resource or task that can be released; dispose() is idempotent. */
export interface Disposable {
    dispose() : void;
}

export interface Queue<T> {
    offer(t: T) : boolean;
    poll() : T | null;
    isEmpty() : boolean;
    clear() : void;
    size() : number;
}

export interface ConditionalSubscriber<T> extends rs.Subscriber<T> {
    tryOnNext(t: T) : boolean;
}

/** A source that can hand out its single value (or null when empty) synchronously. */
export interface ScalarCallable<T> {
    call() : T | null;
    
    // TypeScript has no instanceof for interfaces, existence of this method is considered to be ScalarCallable
    isScalar() : void;
}

export function isScalarCallable<T>(p: rs.Publisher<T>) : p is rs.Publisher<T> & ScalarCallable<T> {
    return "isScalar" in p && typeof p.isScalar === "function";
}

export class CallbackDisposable implements Disposable {
    private mCallback: (() => void) | null;
    
    constructor(callback: () => void) {
        this.mCallback = callback;
    }
    
    dispose() : void {
        const c = this.mCallback;
        if (c != null) {
            this.mCallback = null;
            c();
        }
    }
    
    isDisposed() : boolean {
        return this.mCallback == null;
    }
}

export class Disposables {
    private static REJECTED_INSTANCE : Disposable = new CallbackDisposable(() => { });
    private static DISPOSED_INSTANCE : Disposable = { dispose() { } };
    
    /** Returned by workers that have been shut down. */
    static get REJECTED() : Disposable { return Disposables.REJECTED_INSTANCE; }
    
    /** Marks a slot whose owner has been cancelled. */
    static get DISPOSED() : Disposable { return Disposables.DISPOSED_INSTANCE; }
}

/** Holds one Disposable at a time; replacing it disposes the previous one. */
export class SerialDisposable implements Disposable {
    private current: Disposable | null = null;
    
    replace(next: Disposable) : void {
        const a = this.current;
        if (a == Disposables.DISPOSED) {
            next.dispose();
            return;
        }
        this.current = next;
        if (a != null) {
            a.dispose();
        }
    }
    
    dispose() : void {
        const a = this.current;
        if (a != Disposables.DISPOSED) {
            this.current = Disposables.DISPOSED;
            if (a != null) {
                a.dispose();
            }
        }
    }
    
    isDisposed() : boolean {
        return this.current == Disposables.DISPOSED;
    }
}
