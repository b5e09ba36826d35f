import * as rs from './reactive-streams';
import * as flow from './flow';
import * as sp from './subscription';
import * as util from './util';
import { ComputationError, Exceptions } from './errors';
import { Hooks } from './hooks';

/**
 * Splits the source into one group per key. The group table belongs to this
 * subscriber alone. Groups are emitted in the order their first value arrives
 * and, when the source completes, completed in that same order.
 */
export class GroupBySubscriber<T, K, G extends rs.Processor<T, T>> implements rs.Subscriber<T>, rs.Subscription {

    private s: rs.Subscription = sp.SH.UNSET;

    private groups = new Map<K, G>();

    private queue: flow.Queue<G>;

    private requested: number = 0;

    private wip: number = 0;

    private done: boolean = false;

    private error: Error | null = null;

    private cancelled: boolean = false;

    constructor(private actual: rs.Subscriber<G>, private keySelector: (t: T) => K,
            private newGroup: (key: K, onCancel: () => void) => G, prefetch: number) {
        this.queue = new util.SpscLinkedArrayQueue<G>(prefetch);
    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;

            this.actual.onSubscribe(this);

            s.request(Infinity);
        }
    }

    onNext(t: T) : void {
        if (this.done) {
            return;
        }

        let k : K;
        try {
            k = this.keySelector(t);
        } catch (ex) {
            this.s.cancel();
            this.onError(ComputationError.wrap(ex));
            return;
        }

        if (k == null) {
            this.s.cancel();
            this.onError(Exceptions.nullValue("The keySelector"));
            return;
        }

        let g = this.groups.get(k);
        if (g === undefined) {
            if (this.cancelled) {
                return;
            }
            const key = k;
            g = this.newGroup(key, () => this.groupCancelled(key));
            this.groups.set(key, g);
            this.queue.offer(g);
            this.drain();
        }

        g.onNext(t);
    }

    private groupCancelled(key: K) : void {
        this.groups.delete(key);
        if (this.cancelled && this.groups.size == 0) {
            this.s.cancel();
        }
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.done = true;
        this.error = t;
        for (const g of Array.from(this.groups.values())) {
            g.onError(t);
        }
        this.groups.clear();
        this.drain();
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        for (const g of Array.from(this.groups.values())) {
            g.onComplete();
        }
        this.groups.clear();
        this.drain();
    }

    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            this.requested = util.addCap(this.requested, n);
            this.drain();
        }
    }

    cancel() : void {
        if (!this.cancelled) {
            this.cancelled = true;
            if (this.groups.size == 0) {
                this.s.cancel();
            }
        }
    }

    private drain() : void {
        if (this.wip++ != 0) {
            return;
        }
        let missed = 1;
        const q = this.queue;
        const a = this.actual;

        for (;;) {
            const r = this.requested;
            let e = 0;

            while (e != r) {
                if (this.cancelled) {
                    q.clear();
                    return;
                }
                const g = q.poll();
                if (g == null) {
                    break;
                }
                a.onNext(g);
                e++;
            }

            if (this.cancelled) {
                q.clear();
                return;
            }

            if (this.done && q.isEmpty()) {
                this.cancelled = true;
                const ex = this.error;
                if (ex != null) {
                    a.onError(ex);
                } else {
                    a.onComplete();
                }
                return;
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
