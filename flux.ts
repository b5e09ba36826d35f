import * as rs from './reactive-streams';
import * as flow from './flow';
import * as sp from './subscription';
import * as util from './util';
import * as sch from './scheduler';
import * as range from './flux-range';
import * as map from './flux-map';
import * as take from './flux-take';
import * as filter from './flux-filter';
import * as flatmap from './flux-flatmap';
import * as concat from './flux-concat';
import * as zip from './flux-zip';
import * as combine from './flux-combine';
import * as collect from './flux-collect';
import * as buffer from './flux-buffer';
import * as group from './flux-group';
import * as lcy from './flux-lifecycle';
import * as timed from './flux-timed';
import * as resume from './flux-error';
import * as schedule from './flux-schedule';
import * as mono from './mono';
import { signalLogger } from './flux-log';
import { getConfig } from './config';
import { ComputationError, type ErrorKind, Exceptions } from './errors';
import { Hooks } from './hooks';
import { LambdaSubscriber, unhandledError } from './subscriber';
import type { Logger } from './logger';
import type { Signal } from './signal';

/** Orders numbers numerically and everything else by its string form. */
export function naturalOrder<T>(a: T, b: T) : number {
    if (typeof a === 'number' && typeof b === 'number') {
        return a - b;
    }
    const x = String(a);
    const y = String(b);
    return x < y ? -1 : (x > y ? 1 : 0);
}

function isPublisher<T>(o: rs.Publisher<T> | sch.TimedScheduler) : o is rs.Publisher<T> {
    return 'subscribe' in o;
}

/** A publisher with operators to work with reactive streams of 0 to N elements optionally followed by an error or completion. */
export abstract class Flux<T> implements rs.Publisher<T> {

    /** The default prefetch of the queue-backed operators, `REACTOR_BUFFER_SIZE`. */
    static get BUFFER_SIZE() : number {
        return getConfig().bufferSize;
    }

    protected abstract subscribeActual(s: rs.Subscriber<T>) : void;

    static range(start: number, count: number) : Flux<number> {
        if (count < 0) {
            throw new RangeError(`count >= 0 required but it was ${count}`);
        }
        if (count == 0) {
            return Flux.empty<number>();
        } else
        if (count == 1) {
            return Flux.just(start);
        }
        return new FluxRange(start, count);
    }

    static never<T>() : Flux<T> {
        return new FluxNever<T>();
    }

    static empty<T>() : Flux<T> {
        return new FluxEmpty<T>();
    }

    static just<T>(...values: T[]) : Flux<T> {
        for (const v of values) {
            if (v == null) {
                throw new TypeError("Flux.just does not accept null values");
            }
        }
        if (values.length == 0) {
            return Flux.empty<T>();
        }
        if (values.length == 1) {
            return new FluxJust<T>(values[0]);
        }
        return new FluxArray<T>(values);
    }

    /** Views any Publisher as a Flux. */
    static from<T>(source: rs.Publisher<T>) : Flux<T> {
        if (source instanceof Flux) {
            return source;
        }
        return new FluxSource<T>(source);
    }

    static fromArray<T>(array: ReadonlyArray<T>) : Flux<T> {
        return new FluxArray<T>(array);
    }

    /** The iterable is walked anew for every subscriber. */
    static fromIterable<T>(iterable: Iterable<T>) : Flux<T> {
        return new FluxIterable<T>(iterable);
    }

    static fromCallable<T>(callable: () => T) : Flux<T> {
        return new FluxFromCallable<T>(callable);
    }

    static defer<T>(supplier: () => rs.Publisher<T>) : Flux<T> {
        return new FluxDefer<T>(supplier);
    }

    static error<T>(error: Error) : Flux<T> {
        return new FluxError<T>(error);
    }

    /** Emits 0 after `delay` ms, then completes. */
    static timer(delay: number, scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Flux<number> {
        return new FluxTimer(delay, scheduler);
    }

    /** Emits 0, 1, 2, ... every `period` ms after an `initialDelay`; never completes. */
    static interval(initialDelay: number, period: number, scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Flux<number> {
        return new FluxInterval(initialDelay, period, scheduler);
    }

    static zip<T, R>(sources: ReadonlyArray<rs.Publisher<T>>, zipper: (values: T[]) => R, prefetch: number = Flux.BUFFER_SIZE) : Flux<R> {
        return new FluxZip<R>(slot => {
            const slots = sources.map(p => slot(p));
            return () => zipper(slots.map(x => x.value()));
        }, prefetch);
    }

    static zip2<T1, T2, R>(p1: rs.Publisher<T1>, p2: rs.Publisher<T2>, zipper: (t1: T1, t2: T2) => R,
            prefetch: number = Flux.BUFFER_SIZE) : Flux<R> {
        return new FluxZip<R>(slot => {
            const a = slot(p1);
            const b = slot(p2);
            return () => zipper(a.value(), b.value());
        }, prefetch);
    }

    static zip3<T1, T2, T3, R>(p1: rs.Publisher<T1>, p2: rs.Publisher<T2>, p3: rs.Publisher<T3>,
            zipper: (t1: T1, t2: T2, t3: T3) => R, prefetch: number = Flux.BUFFER_SIZE) : Flux<R> {
        return new FluxZip<R>(slot => {
            const a = slot(p1);
            const b = slot(p2);
            const c = slot(p3);
            return () => zipper(a.value(), b.value(), c.value());
        }, prefetch);
    }

    static merge<T>(sources: rs.Publisher<rs.Publisher<T>>, maxConcurrency: number = Infinity, prefetch: number = Flux.BUFFER_SIZE) : Flux<T> {
        return new FluxFlatMap<rs.Publisher<T>, T>(sources, p => p, maxConcurrency, prefetch);
    }

    static mergeArray<T>(...sources: rs.Publisher<T>[]) : Flux<T> {
        return Flux.merge(Flux.fromArray(sources));
    }

    static concat<T>(sources: rs.Publisher<rs.Publisher<T>>, prefetch: number = 2) : Flux<T> {
        return new FluxConcatMap<rs.Publisher<T>, T>(sources, p => p, prefetch);
    }

    static concatArray<T>(...sources: rs.Publisher<T>[]) : Flux<T> {
        return Flux.concat(Flux.fromArray(sources));
    }

    static combineLatest<T, R>(sources: ReadonlyArray<rs.Publisher<T>>, combiner: (values: T[]) => R,
            prefetch: number = Flux.BUFFER_SIZE) : Flux<R> {
        return new FluxCombineLatest<R>(slot => {
            const slots = sources.map(p => slot(p));
            return () => combiner(slots.map(x => x.value()));
        }, prefetch);
    }

    static combineLatest2<T1, T2, R>(p1: rs.Publisher<T1>, p2: rs.Publisher<T2>, combiner: (t1: T1, t2: T2) => R,
            prefetch: number = Flux.BUFFER_SIZE) : Flux<R> {
        return new FluxCombineLatest<R>(slot => {
            const a = slot(p1);
            const b = slot(p2);
            return () => combiner(a.value(), b.value());
        }, prefetch);
    }

    static combineLatest3<T1, T2, T3, R>(p1: rs.Publisher<T1>, p2: rs.Publisher<T2>, p3: rs.Publisher<T3>,
            combiner: (t1: T1, t2: T2, t3: T3) => R, prefetch: number = Flux.BUFFER_SIZE) : Flux<R> {
        return new FluxCombineLatest<R>(slot => {
            const a = slot(p1);
            const b = slot(p2);
            const c = slot(p3);
            return () => combiner(a.value(), b.value(), c.value());
        }, prefetch);
    }

    // ------------------------------------

    map<R>(mapper: (t: T) => R) : Flux<R> {
        return new FluxMap<T, R>(this, mapper);
    }

    filter(predicate: (t: T) => boolean) : Flux<T> {
        return new FluxFilter<T>(this, predicate);
    }

    lift<R>(lifter: (s: rs.Subscriber<R>) => rs.Subscriber<T>) : Flux<R> {
        return new FluxLift<T, R>(this, lifter);
    }

    hide() : Flux<T> {
        return new FluxHide<T>(this);
    }

    take(n: number) : Flux<T> {
        return new FluxTake<T>(this, n);
    }

    skip(n: number) : Flux<T> {
        return new FluxSkip<T>(this, n);
    }

    takeWhile(predicate: (t: T) => boolean) : Flux<T> {
        return new FluxTakeWhile<T>(this, predicate);
    }

    /** Drops values whose key was already seen by the same subscriber. */
    distinct<K = T>(keySelector?: (t: T) => K) : Flux<T> {
        if (keySelector === undefined) {
            return new FluxDistinct<T, T>(this, t => t);
        }
        return new FluxDistinct<T, K>(this, keySelector);
    }

    flatMap<R>(mapper: (t: T) => rs.Publisher<R>, maxConcurrency: number = Infinity, prefetch: number = Flux.BUFFER_SIZE) : Flux<R> {
        return new FluxFlatMap<T, R>(this, mapper, maxConcurrency, prefetch);
    }

    concatMap<R>(mapper: (t: T) => rs.Publisher<R>, prefetch: number = 2) : Flux<R> {
        return new FluxConcatMap<T, R>(this, mapper, prefetch);
    }

    flatMapIterable<R>(mapper: (t: T) => Iterable<R>) : Flux<R> {
        return this.concatMap(t => Flux.fromIterable(mapper(t)));
    }

    buffer(size: number) : Flux<T[]> {
        return new FluxBuffer<T>(this, size);
    }

    window(size: number) : Flux<Flux<T>> {
        return new FluxWindow<T>(this, size);
    }

    groupBy<K>(keySelector: (t: T) => K, prefetch: number = Flux.BUFFER_SIZE) : Flux<GroupedFlux<K, T>> {
        return new FluxGroupBy<T, K>(this, keySelector, prefetch);
    }

    startWith(...values: T[]) : Flux<T> {
        return Flux.concatArray<T>(Flux.fromArray(values), this);
    }

    materialize() : Flux<Signal<T>> {
        return new FluxMaterialize<T>(this);
    }

    // ------------------------------------

    /** The container is created anew for every subscriber. */
    collect<U>(containerFactory: () => U, collector: (u: U, t: T) => void) : mono.Mono<U> {
        return new mono.MonoLift<T, U>(this, s => new collect.CollectSubscriber<T, U>(s, containerFactory(), collector));
    }

    collectList() : mono.Mono<T[]> {
        return this.collect<T[]>(() => [], (a, t) => { a.push(t); });
    }

    collectSortedList(comparator: (a: T, b: T) => number = naturalOrder) : mono.Mono<T[]> {
        return this.collectList().map(list => list.sort(comparator));
    }

    sort(comparator?: (a: T, b: T) => number) : Flux<T> {
        return this.collectSortedList(comparator).flatMapMany(list => Flux.fromArray(list));
    }

    reduce(reducer: (a: T, b: T) => T) : mono.Mono<T>;
    reduce<U>(seed: U, reducer: (u: U, t: T) => U) : mono.Mono<U>;
    reduce<U>(...args: [(a: T, b: T) => T] | [U, (u: U, t: T) => U]) : mono.Mono<T> | mono.Mono<U> {
        if (args.length == 1) {
            const [reducer] = args;
            return new mono.MonoLift<T, T>(this, s => new collect.ReduceFirstSubscriber<T>(s, reducer));
        }
        const [seed, reducer] = args;
        return new mono.MonoLift<T, U>(this, s => new collect.ReduceSubscriber<T, U>(s, seed, reducer));
    }

    /** Like the seeded `reduce`, with the seed created anew for every subscriber. */
    reduceWith<U>(seedFactory: () => U, reducer: (u: U, t: T) => U) : mono.Mono<U> {
        return new mono.MonoLift<T, U>(this, s => new collect.ReduceSubscriber<T, U>(s, seedFactory(), reducer));
    }

    count() : mono.Mono<number> {
        return this.reduce(0, (n: number) => n + 1);
    }

    /** The first value, if any; the source is cancelled once it has arrived. */
    next() : mono.Mono<T> {
        return new mono.MonoLift<T, T>(this, s => new collect.NextSubscriber<T>(s));
    }

    // ------------------------------------

    zipWith<U, R>(other: rs.Publisher<U>, zipper: (t: T, u: U) => R) : Flux<R> {
        return Flux.zip2(this, other, zipper);
    }

    mergeWith(other: rs.Publisher<T>) : Flux<T> {
        return Flux.mergeArray<T>(this, other);
    }

    concatWith(other: rs.Publisher<T>) : Flux<T> {
        return Flux.concatArray<T>(this, other);
    }

    combineWith<U, R>(other: rs.Publisher<U>, combiner: (t: T, u: U) => R, prefetch?: number) : Flux<R> {
        return Flux.combineLatest2(this, other, combiner, prefetch);
    }

    // ------------------------------------

    doOnLifecycle(callbacks: lcy.LifecycleCallbacks<T>) : Flux<T> {
        return new FluxDoOnLifecycle<T>(this, callbacks);
    }

    doOnSubscribe(onSubscribe: (s: rs.Subscription) => void) : Flux<T> {
        return this.doOnLifecycle({ onSubscribe });
    }

    doOnNext(onNext: (t: T) => void) : Flux<T> {
        return this.doOnLifecycle({ onNext });
    }

    doOnError(onError: (t: Error) => void) : Flux<T> {
        return this.doOnLifecycle({ onError });
    }

    doOnComplete(onComplete: () => void) : Flux<T> {
        return this.doOnLifecycle({ onComplete });
    }

    doOnRequest(onRequest: (n: number) => void) : Flux<T> {
        return this.doOnLifecycle({ onRequest });
    }

    doOnCancel(onCancel: () => void) : Flux<T> {
        return this.doOnLifecycle({ onCancel });
    }

    doAfterTerminate(onAfterTerminate: () => void) : Flux<T> {
        return this.doOnLifecycle({ onAfterTerminate });
    }

    /** Logs every signal, request and cancellation under `category`. */
    log(category: string = 'reactor.Flux', logger?: Logger) : Flux<T> {
        return this.doOnLifecycle(signalLogger<T>(category, logger));
    }

    // ------------------------------------

    timeout(timeout: number, scheduler?: sch.TimedScheduler) : Flux<T>;
    timeout(timeout: number, fallback: rs.Publisher<T>, scheduler?: sch.TimedScheduler) : Flux<T>;
    timeout(timeout: number, second?: rs.Publisher<T> | sch.TimedScheduler, third?: sch.TimedScheduler) : Flux<T> {
        if (second === undefined) {
            return new FluxTimeout<T>(this, timeout, null, sch.Schedulers.parallel());
        }
        if (isPublisher(second)) {
            return new FluxTimeout<T>(this, timeout, second, third ?? sch.Schedulers.parallel());
        }
        return new FluxTimeout<T>(this, timeout, null, second);
    }

    /** Replaces an error (optionally only one of `kind`) with a last value. */
    onErrorReturn(value: T, kind?: ErrorKind) : Flux<T> {
        return new FluxOnErrorReturn<T>(this, value, kind);
    }

    onErrorResume(handler: resume.ErrorResumeHandler<T>) : Flux<T> {
        return new FluxOnErrorResume<T>(this, handler);
    }

    delaySubscription(delay: number, scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Flux<T> {
        return new FluxDelaySubscription<T>(this, delay, scheduler);
    }

    /** Delays each value by `delay` ms, counted from the emission of the previous one. */
    delayElements(delay: number, scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Flux<T> {
        return this.concatMap(t => mono.Mono.just(t).delaySubscription(delay, scheduler));
    }

    subscribeOn(scheduler: sch.Scheduler) : Flux<T> {
        return new FluxSubscribeOn<T>(this, scheduler);
    }

    publishOn(scheduler: sch.Scheduler, prefetch: number = Flux.BUFFER_SIZE) : Flux<T> {
        return new FluxPublishOn<T>(this, scheduler, prefetch);
    }

    // ------------------------------------

    subscribe(onNext?: (t: T) => void, onError?: (t: Error) => void, onComplete?: () => void) : LambdaSubscriber<T>;
    subscribe(s: rs.Subscriber<T>) : void;
    subscribe(first?: rs.Subscriber<T> | ((t: T) => void), onError?: (t: Error) => void, onComplete?: () => void) : LambdaSubscriber<T> | void {
        if (first === undefined || typeof first === 'function') {
            const ls = new LambdaSubscriber<T>(
                first ?? (() => { }),
                onError ?? unhandledError,
                onComplete ?? (() => { }));
            this.subscribeActual(ls);
            return ls;
        }
        this.subscribeActual(first);
    }
}

// ----------------------------------------------------------------------

/** Dispatches signals to every current Subscriber; one that has not requested enough is failed and dropped. */
export class DirectProcessor<T> extends Flux<T> implements rs.Processor<T, T> {
    private done: boolean = false;
    private error: Error | null = null;
    private subscribers: Array<DirectSubscription<T>> = [];

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        if (this.done) {
            const ex = this.error;
            if (ex != null) {
                sp.EmptySubscription.error(s, ex);
            } else {
                sp.EmptySubscription.complete(s);
            }
            return;
        }
        const ds = new DirectSubscription<T>(s, this);
        this.subscribers.push(ds);
        s.onSubscribe(ds);
    }

    hasSubscribers() : boolean {
        return this.subscribers.length != 0;
    }

    remove(ds: DirectSubscription<T>) : void {
        const a = this.subscribers;
        const idx = a.indexOf(ds);
        if (idx >= 0) {
            a.splice(idx, 1);
        }
    }

    onSubscribe(s: rs.Subscription) : void {
        if (this.done) {
            s.cancel();
        } else {
            s.request(Infinity);
        }
    }

    onNext(t: T) : void {
        if (this.done) {
            return;
        }
        for (const ds of this.subscribers.slice()) {
            ds.onNext(t);
        }
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.error = t;
        this.done = true;
        const a = this.subscribers;
        this.subscribers = [];
        for (const ds of a) {
            ds.actual.onError(t);
        }
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        const a = this.subscribers;
        this.subscribers = [];
        for (const ds of a) {
            ds.actual.onComplete();
        }
    }
}

export class DirectSubscription<T> implements rs.Subscription {

    private requested: number = 0;

    private cancelled: boolean = false;

    constructor(readonly actual: rs.Subscriber<T>, private parent: DirectProcessor<T>) {

    }

    onNext(t: T) : void {
        if (this.cancelled) {
            return;
        }
        const r = this.requested;
        if (r == 0) {
            this.cancel();
            this.actual.onError(Exceptions.lackOfRequests("value through the DirectProcessor"));
            return;
        }
        if (r != Infinity) {
            this.requested = r - 1;
        }
        this.actual.onNext(t);
    }

    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            this.requested = util.addCap(this.requested, n);
        }
    }

    cancel() : void {
        if (!this.cancelled) {
            this.cancelled = true;
            this.parent.remove(this);
        }
    }
}

/** Buffers signals until its single Subscriber requests them. */
export class UnicastProcessor<T> extends Flux<T> implements rs.Processor<T, T>, rs.Subscription {

    private once: boolean = false;

    private mActual: rs.Subscriber<T> | null = null;

    private mRequested: number = 0;

    private queue: util.SpscLinkedArrayQueue<T>;

    private wip: number = 0;

    private cancelled: boolean = false;
    private done: boolean = false;
    private error: Error | null = null;

    constructor(capacity: number = Flux.BUFFER_SIZE, private onCancel: (() => void) | null = null) {
        super();
        this.queue = new util.SpscLinkedArrayQueue<T>(capacity);
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        if (this.once) {
            sp.EmptySubscription.error(s, new Error("This processor allows only a single Subscriber"));
            return;
        }
        this.once = true;
        this.mActual = s;
        s.onSubscribe(this);
        if (this.cancelled) {
            this.mActual = null;
        } else {
            this.drain();
        }
    }

    onSubscribe(s: rs.Subscription) : void {
        if (this.done || this.cancelled) {
            s.cancel();
        } else {
            s.request(Infinity);
        }
    }

    onNext(t: T) : void {
        if (this.done || this.cancelled) {
            return;
        }
        this.queue.offer(t);
        this.drain();
    }

    onError(t: Error) : void {
        if (this.done) {
            Hooks.errorDropped(t);
            return;
        }
        this.error = t;
        this.done = true;
        this.drain();
    }

    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        this.drain();
    }

    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            this.mRequested = util.addCap(this.mRequested, n);
            this.drain();
        }
    }

    cancel() : void {
        if (this.cancelled) {
            return;
        }
        this.cancelled = true;
        const f = this.onCancel;
        if (f != null) {
            this.onCancel = null;
            f();
        }
        if (this.wip++ == 0) {
            this.mActual = null;
            this.queue.clear();
        }
    }

    private terminate(a: rs.Subscriber<T>) : void {
        this.mActual = null;
        const ex = this.error;
        if (ex != null) {
            a.onError(ex);
        } else {
            a.onComplete();
        }
    }

    private drain() : void {
        const a = this.mActual;
        if (a == null) {
            return;
        }
        if (this.wip++ != 0) {
            return;
        }

        let missed = 1;
        const q = this.queue;

        for (;;) {

            const r = this.mRequested;
            let e = 0;

            while (e != r) {
                if (this.cancelled) {
                    this.mActual = null;
                    q.clear();
                    return;
                }

                const d = this.done;
                const v = q.poll();

                if (v == null) {
                    if (d) {
                        this.terminate(a);
                        return;
                    }
                    break;
                }

                a.onNext(v);

                e++;
            }

            if (e == r) {
                if (this.cancelled) {
                    this.mActual = null;
                    q.clear();
                    return;
                }
                if (this.done && q.isEmpty()) {
                    this.terminate(a);
                    return;
                }
            }

            if (e != 0 && r != Infinity) {
                this.mRequested -= e;
            }

            this.wip -= missed;
            if (this.wip == 0) {
                break;
            }
            missed = this.wip;
        }
    }
}

/** The values of one key of a `groupBy`. */
export class GroupedFlux<K, T> extends UnicastProcessor<T> {

    constructor(private readonly groupKey: K, capacity?: number, onCancel?: () => void) {
        super(capacity, onCancel ?? null);
    }

    key() : K {
        return this.groupKey;
    }
}

// ----------------------------------------------------------------------

class FluxRange extends Flux<number> {

    constructor(private start: number, private rangeCount: number) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<number>) : void {
        s.onSubscribe(new range.FluxRangeSubscription(this.start, this.start + this.rangeCount, s));
    }
}

class FluxArray<T> extends Flux<T> {

    constructor(private array: ReadonlyArray<T>) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        if (this.array.length == 0) {
            sp.EmptySubscription.complete(s);
            return;
        }
        s.onSubscribe(new range.FluxArraySubscription<T>(this.array, s));
    }
}

class FluxIterable<T> extends Flux<T> {

    constructor(private iterable: Iterable<T>) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        let a: T[];
        try {
            a = Array.from(this.iterable);
        } catch (ex) {
            sp.EmptySubscription.error(s, Exceptions.propagate(ex));
            return;
        }
        if (a.length == 0) {
            sp.EmptySubscription.complete(s);
            return;
        }
        s.onSubscribe(new range.FluxArraySubscription<T>(a, s));
    }
}

class FluxEmpty<T> extends Flux<T> implements flow.ScalarCallable<T> {

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        sp.EmptySubscription.complete(s);
    }

    isScalar() : void { }

    call() : T | null {
        return null;
    }
}

class FluxNever<T> extends Flux<T> {

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        s.onSubscribe(sp.EmptySubscription.INSTANCE);
    }
}

class FluxError<T> extends Flux<T> {

    constructor(private error: Error) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        sp.EmptySubscription.error(s, this.error);
    }
}

class FluxJust<T> extends Flux<T> implements flow.ScalarCallable<T> {

    constructor(private value: T) {
        super();
    }

    isScalar() : void { }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        s.onSubscribe(new sp.ScalarSubscription<T>(this.value, s));
    }

    call() : T {
        return this.value;
    }
}

class FluxFromCallable<T> extends Flux<T> {

    constructor(private callable: () => T) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        const dsd = new sp.DeferredScalarSubscription<T>(s);
        s.onSubscribe(dsd);

        if (dsd.isCancelled()) {
            return;
        }

        let v: T;
        try {
            v = this.callable();
        } catch (ex) {
            s.onError(ComputationError.wrap(ex));
            return;
        }
        if (v == null) {
            s.onComplete();
            return;
        }
        dsd.complete(v);
    }
}

class FluxDefer<T> extends Flux<T> {
    constructor(private supplier: () => rs.Publisher<T>) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        let p: rs.Publisher<T>;

        try {
            p = this.supplier();
        } catch (ex) {
            sp.EmptySubscription.error(s, ComputationError.wrap(ex));
            return;
        }

        if (p == null) {
            sp.EmptySubscription.error(s, Exceptions.nullValue("The supplier"));
            return;
        }

        p.subscribe(s);
    }
}

class FluxTimer extends Flux<number> {
    constructor(private delay: number, private scheduler: sch.TimedScheduler) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<number>) : void {
        const p = new timed.TimedSubscription(s);
        s.onSubscribe(p);

        p.setFuture(this.scheduler.scheduleDelayed(p.run, this.delay));
    }
}

class FluxInterval extends Flux<number> {
    constructor(private initialDelay: number, private period: number, private scheduler: sch.TimedScheduler) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<number>) : void {
        const p = new timed.PeriodicTimedSubscription(s);
        s.onSubscribe(p);

        p.setFuture(this.scheduler.schedulePeriodic(p.run, this.initialDelay, this.period));
    }
}

class FluxZip<R> extends Flux<R> {
    constructor(private assembler: zip.Assembler<R>, private prefetch: number) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<R>) : void {
        new zip.ZipCoordinator<R>(s, this.assembler, this.prefetch).subscribe();
    }
}

class FluxCombineLatest<R> extends Flux<R> {
    constructor(private assembler: zip.Assembler<R>, private prefetch: number) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<R>) : void {
        new combine.CombineLatestCoordinator<R>(s, this.assembler, this.prefetch).subscribe();
    }
}

// ----------------------------------------------------------------------

class FluxSource<T> extends Flux<T> {

    constructor(private source: rs.Publisher<T>) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        this.source.subscribe(s);
    }
}

class FluxMap<T, R> extends Flux<R> {

    constructor(private source: rs.Publisher<T>, private mapper: (t: T) => R) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<R>) : void {
        this.source.subscribe(new map.FluxMapSubscriber<T, R>(s, this.mapper));
    }
}

class FluxFilter<T> extends Flux<T> {

    constructor(private source: rs.Publisher<T>, private predicate: (t: T) => boolean) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        this.source.subscribe(new filter.FluxFilterSubscriber<T>(s, this.predicate));
    }
}

class FluxDistinct<T, K> extends Flux<T> {

    constructor(private source: rs.Publisher<T>, private keySelector: (t: T) => K) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        this.source.subscribe(new filter.FluxDistinctSubscriber<T, K>(s, this.keySelector));
    }
}

class FluxLift<T, R> extends Flux<R> {

    constructor(private source: rs.Publisher<T>, private lifter: (s: rs.Subscriber<R>) => rs.Subscriber<T>) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<R>) : void {
        let parent: rs.Subscriber<T>;
        try {
            parent = this.lifter(s);
        } catch (ex) {
            sp.EmptySubscription.error(s, ComputationError.wrap(ex));
            return;
        }
        this.source.subscribe(parent);
    }
}

class FluxHide<T> extends Flux<T> {
    constructor(private source: rs.Publisher<T>) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        this.source.subscribe(new map.FluxHideSubscriber<T>(s));
    }
}

class FluxMaterialize<T> extends Flux<Signal<T>> {
    constructor(private source: rs.Publisher<T>) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<Signal<T>>) : void {
        this.source.subscribe(new map.MaterializeSubscriber<T>(s));
    }
}

class FluxTake<T> extends Flux<T> {

    constructor(private source: rs.Publisher<T>, private n: number) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        this.source.subscribe(new take.FluxTakeSubscriber<T>(this.n, s));
    }
}

class FluxSkip<T> extends Flux<T> {

    constructor(private source: rs.Publisher<T>, private n: number) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        this.source.subscribe(new take.FluxSkipSubscriber<T>(s, this.n));
    }
}

class FluxTakeWhile<T> extends Flux<T> {

    constructor(private source: rs.Publisher<T>, private predicate: (t: T) => boolean) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        this.source.subscribe(new take.FluxTakeWhileSubscriber<T>(s, this.predicate));
    }
}

class FluxFlatMap<T, R> extends Flux<R> {

    constructor(
            private source: rs.Publisher<T>,
            private mapper: (t: T) => rs.Publisher<R>,
            private maxConcurrency: number,
            private prefetch: number) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<R>) : void {
        this.source.subscribe(new flatmap.FlatMapSubscriber<T, R>(s, this.mapper, this.maxConcurrency, this.prefetch));
    }
}

class FluxConcatMap<T, R> extends Flux<R> {
    constructor(private source: rs.Publisher<T>,
            private mapper: (t: T) => rs.Publisher<R>,
            private prefetch: number) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<R>) : void {
        this.source.subscribe(new concat.ConcatMapSubscriber<T, R>(s, this.mapper, this.prefetch));
    }
}

class FluxBuffer<T> extends Flux<T[]> {
    constructor(private source: rs.Publisher<T>, private size: number) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T[]>) : void {
        this.source.subscribe(new buffer.BufferSubscriber<T>(s, this.size));
    }
}

class FluxWindow<T> extends Flux<Flux<T>> {
    constructor(private source: rs.Publisher<T>, private size: number) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<Flux<T>>) : void {
        const size = this.size;
        this.source.subscribe(new buffer.WindowSubscriber<T, UnicastProcessor<T>>(s, size,
            () => new UnicastProcessor<T>(size)));
    }
}

class FluxGroupBy<T, K> extends Flux<GroupedFlux<K, T>> {
    constructor(private source: rs.Publisher<T>, private keySelector: (t: T) => K, private prefetch: number) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<GroupedFlux<K, T>>) : void {
        const prefetch = this.prefetch;
        this.source.subscribe(new group.GroupBySubscriber<T, K, GroupedFlux<K, T>>(s, this.keySelector,
            (key, onCancel) => new GroupedFlux<K, T>(key, prefetch, onCancel), prefetch));
    }
}

class FluxDoOnLifecycle<T> extends Flux<T> {
    constructor(private source: rs.Publisher<T>, private callbacks: lcy.LifecycleCallbacks<T>) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        this.source.subscribe(new lcy.DoOnLifecycle<T>(s, this.callbacks));
    }
}

class FluxTimeout<T> extends Flux<T> {
    constructor(private source: rs.Publisher<T>, private timeoutMillis: number,
            private fallback: rs.Publisher<T> | null, private scheduler: sch.TimedScheduler) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        const w = this.scheduler.createWorker();
        this.source.subscribe(new timed.TimeoutSubscriber<T>(s, this.timeoutMillis, w, this.fallback));
    }
}

class FluxOnErrorReturn<T> extends Flux<T> {
    constructor(private source: rs.Publisher<T>, private value: T, private kind?: ErrorKind) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        this.source.subscribe(new resume.OnErrorReturnSubscriber<T>(s, this.value, this.kind));
    }
}

class FluxOnErrorResume<T> extends Flux<T> {
    constructor(private source: rs.Publisher<T>, private handler: resume.ErrorResumeHandler<T>) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        this.source.subscribe(new resume.OnErrorResumeSubscriber<T>(s, this.handler));
    }
}

class FluxDelaySubscription<T> extends Flux<T> {
    constructor(private source: rs.Publisher<T>, private delay: number, private scheduler: sch.TimedScheduler) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        new timed.DelaySubscriptionSubscriber<T>(s, this.source).start(this.scheduler, this.delay);
    }
}

class FluxSubscribeOn<T> extends Flux<T> {
    constructor(private source: rs.Publisher<T>, private scheduler: sch.Scheduler) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        new schedule.SubscribeOnSubscriber<T>(s, this.scheduler.createWorker()).start(this.source);
    }
}

class FluxPublishOn<T> extends Flux<T> {
    constructor(private source: rs.Publisher<T>, private scheduler: sch.Scheduler, private prefetch: number) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        this.source.subscribe(new schedule.PublishOnSubscriber<T>(s, this.scheduler.createWorker(), this.prefetch));
    }
}
