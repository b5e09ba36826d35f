import * as rs from './reactive-streams';
import * as flow from './flow';
import * as sp from './subscription';
import * as sch from './scheduler';
import * as util from './util';
import { Exceptions } from './errors';
import { Hooks } from './hooks';

/**
 * Subscribes to the source from a task on `worker`, and issues every request
 * from that worker too, so a synchronous source produces on it.
 */
export class SubscribeOnSubscriber<T> implements rs.Subscriber<T>, rs.Subscription {

    private s: rs.Subscription = sp.SH.UNSET;

    private requested: number = 0;

    private cancelled: boolean = false;

    constructor(private actual: rs.Subscriber<T>, private worker: sch.Worker) {

    }

    start(source: rs.Publisher<T>) : void {
        this.actual.onSubscribe(this);
        this.worker.schedule(() => source.subscribe(this));
    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;
            const r = this.requested;
            if (r != 0) {
                this.requested = 0;
                this.requestUpstream(r);
            }
        }
    }

    private requestUpstream(n: number) : void {
        this.worker.schedule(() => this.s.request(n));
    }

    onNext(t: T) : void {
        this.actual.onNext(t);
    }

    onError(t: Error) : void {
        this.worker.shutdown();
        this.actual.onError(t);
    }

    onComplete() : void {
        this.worker.shutdown();
        this.actual.onComplete();
    }

    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            if (this.s == sp.SH.UNSET) {
                this.requested = util.addCap(this.requested, n);
            } else {
                this.requestUpstream(n);
            }
        }
    }

    cancel() : void {
        if (!this.cancelled) {
            this.cancelled = true;
            this.s.cancel();
            this.worker.shutdown();
        }
    }
}

/**
 * Hands every signal over to `worker`, keeping up to `prefetch` values
 * buffered; everything downstream runs on the worker.
 */
export class PublishOnSubscriber<T> implements rs.Subscriber<T>, rs.Subscription {

    private s: rs.Subscription = sp.SH.UNSET;

    private queue: flow.Queue<T>;

    private requested: number = 0;

    private wip: number = 0;

    private produced: number = 0;

    private limit: number;

    private done: boolean = false;

    private error: Error | null = null;

    private cancelled: boolean = false;

    constructor(private actual: rs.Subscriber<T>, private worker: sch.Worker, private prefetch: number) {
        this.queue = new util.SpscArrayQueue<T>(prefetch);
        this.limit = prefetch - (prefetch >> 2);
    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.actual.onSubscribe(this);

            s.request(this.prefetch);
        }
    }

    onNext(t: T) : void {
        if (this.done) {
            return;
        }
        if (!this.queue.offer(t)) {
            this.s.cancel();
            this.onError(Exceptions.lackOfRequests("value on the target worker"));
            return;
        }
        this.schedule();
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.error = t;
        this.done = true;
        this.schedule();
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        this.schedule();
    }

    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            this.requested = util.addCap(this.requested, n);
            this.schedule();
        }
    }

    cancel() : void {
        if (!this.cancelled) {
            this.cancelled = true;
            this.s.cancel();
            this.worker.shutdown();
            if (this.wip++ == 0) {
                this.queue.clear();
            }
        }
    }

    private schedule() : void {
        if (this.wip++ == 0) {
            this.worker.schedule(this.drain);
        }
    }

    private drain = () : void => {
        let missed = 1;
        const q = this.queue;
        const a = this.actual;

        for (;;) {
            const r = this.requested;
            let e = 0;

            for (;;) {
                if (this.cancelled) {
                    q.clear();
                    return;
                }

                const d = this.done;
                const empty = q.isEmpty();

                if (d && empty) {
                    this.cancelled = true;
                    this.worker.shutdown();
                    const ex = this.error;
                    if (ex != null) {
                        a.onError(ex);
                    } else {
                        a.onComplete();
                    }
                    return;
                }

                if (empty || e == r) {
                    break;
                }

                const v = q.poll();
                if (v == null) {
                    break;
                }

                a.onNext(v);

                e++;

                const p = this.produced + 1;
                if (p == this.limit) {
                    this.produced = 0;
                    this.s.request(p);
                } else {
                    this.produced = p;
                }
            }

            if (e != 0 && r != Infinity) {
                this.requested -= e;
            }

            this.wip -= missed;
            if (this.wip == 0) {
                break;
            }
            missed = this.wip;
        }
    }
}
