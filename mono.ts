import * as rs from './reactive-streams';
import * as flow from './flow';
import * as sp from './subscription';
import * as sch from './scheduler';
import * as map from './flux-map';
import * as filter from './flux-filter';
import * as flatmap from './flux-flatmap';
import * as zip from './flux-zip';
import * as lcy from './flux-lifecycle';
import * as timed from './flux-timed';
import * as resume from './flux-error';
import * as schedule from './flux-schedule';
import * as flux from './flux';
import { signalLogger } from './flux-log';
import { ComputationError, type ErrorKind, Exceptions } from './errors';
import { LambdaSubscriber, unhandledError } from './subscriber';
import type { Logger } from './logger';

function isPublisher<T>(o: rs.Publisher<T> | sch.TimedScheduler) : o is rs.Publisher<T> {
    return 'subscribe' in o;
}

/** A publisher of at most one value followed by completion, or of an error. */
export abstract class Mono<T> implements rs.Publisher<T> {

    protected abstract subscribeActual(s: rs.Subscriber<T>) : void;

    /** The value is captured now and replayed to every subscriber. */
    static just<T>(value: T) : Mono<T> {
        if (value == null) {
            throw new TypeError("Mono.just does not accept a null value");
        }
        return new MonoJust<T>(value);
    }

    static justOrEmpty<T>(value: T | null | undefined) : Mono<T> {
        if (value == null) {
            return Mono.empty<T>();
        }
        return new MonoJust<T>(value);
    }

    static empty<T>() : Mono<T> {
        return new MonoEmpty<T>();
    }

    static never<T>() : Mono<T> {
        return new MonoNever<T>();
    }

    static error<T>(error: Error) : Mono<T> {
        return new MonoError<T>(error);
    }

    /** Calls `supplier` once per subscription; a null result completes empty. */
    static fromSupplier<T>(supplier: () => T) : Mono<T> {
        return new MonoFromSupplier<T>(supplier);
    }

    static fromCallable<T>(callable: () => T) : Mono<T> {
        return new MonoFromSupplier<T>(callable);
    }

    static defer<T>(supplier: () => Mono<T>) : Mono<T> {
        return new MonoDefer<T>(supplier);
    }

    /** Emits 0 after `delay` ms. */
    static delay(delay: number, scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Mono<number> {
        return new MonoDelay(delay, scheduler);
    }

    // ------------------------------------

    map<R>(mapper: (t: T) => R) : Mono<R> {
        return new MonoLift<T, R>(this, s => new map.FluxMapSubscriber<T, R>(s, mapper));
    }

    filter(predicate: (t: T) => boolean) : Mono<T> {
        return new MonoLift<T, T>(this, s => new filter.FluxFilterSubscriber<T>(s, predicate));
    }

    flatMap<R>(mapper: (t: T) => Mono<R>) : Mono<R> {
        return new MonoLift<T, R>(this, s => new flatmap.FlatMapSubscriber<T, R>(s, mapper, Infinity, 1));
    }

    flatMapMany<R>(mapper: (t: T) => rs.Publisher<R>) : flux.Flux<R> {
        return this.flux().flatMap(mapper);
    }

    zipWith<U>(other: Mono<U>) : Mono<[T, U]>;
    zipWith<U, R>(other: Mono<U>, combiner: (t: T, u: U) => R) : Mono<R>;
    zipWith<U, R>(other: Mono<U>, combiner?: (t: T, u: U) => R) : Mono<R> | Mono<[T, U]> {
        if (combiner === undefined) {
            return new MonoZip<[T, U]>(slot => {
                const a = slot(this);
                const b = slot(other);
                return () => [a.value(), b.value()];
            });
        }
        return new MonoZip<R>(slot => {
            const a = slot(this);
            const b = slot(other);
            return () => combiner(a.value(), b.value());
        });
    }

    hide() : Mono<T> {
        return new MonoLift<T, T>(this, s => new map.FluxHideSubscriber<T>(s));
    }

    flux() : flux.Flux<T> {
        return flux.Flux.from(this);
    }

    // ------------------------------------

    doOnLifecycle(callbacks: lcy.LifecycleCallbacks<T>) : Mono<T> {
        return new MonoLift<T, T>(this, s => new lcy.DoOnLifecycle<T>(s, callbacks));
    }

    doOnSubscribe(onSubscribe: (s: rs.Subscription) => void) : Mono<T> {
        return this.doOnLifecycle({ onSubscribe });
    }

    doOnNext(onNext: (t: T) => void) : Mono<T> {
        return this.doOnLifecycle({ onNext });
    }

    doOnError(onError: (t: Error) => void) : Mono<T> {
        return this.doOnLifecycle({ onError });
    }

    doOnComplete(onComplete: () => void) : Mono<T> {
        return this.doOnLifecycle({ onComplete });
    }

    doOnRequest(onRequest: (n: number) => void) : Mono<T> {
        return this.doOnLifecycle({ onRequest });
    }

    doOnCancel(onCancel: () => void) : Mono<T> {
        return this.doOnLifecycle({ onCancel });
    }

    doAfterTerminate(onAfterTerminate: () => void) : Mono<T> {
        return this.doOnLifecycle({ onAfterTerminate });
    }

    log(category: string = 'reactor.Mono', logger?: Logger) : Mono<T> {
        return this.doOnLifecycle(signalLogger<T>(category, logger));
    }

    // ------------------------------------

    timeout(timeout: number, scheduler?: sch.TimedScheduler) : Mono<T>;
    timeout(timeout: number, fallback: Mono<T>, scheduler?: sch.TimedScheduler) : Mono<T>;
    timeout(timeout: number, second?: Mono<T> | sch.TimedScheduler, third?: sch.TimedScheduler) : Mono<T> {
        let other: rs.Publisher<T> | null = null;
        let scheduler: sch.TimedScheduler;
        if (second === undefined) {
            scheduler = sch.Schedulers.parallel();
        } else
        if (isPublisher(second)) {
            other = second;
            scheduler = third ?? sch.Schedulers.parallel();
        } else {
            scheduler = second;
        }
        return new MonoLift<T, T>(this, s => new timed.TimeoutSubscriber<T>(s, timeout, scheduler.createWorker(), other));
    }

    onErrorReturn(value: T, kind?: ErrorKind) : Mono<T> {
        return new MonoLift<T, T>(this, s => new resume.OnErrorReturnSubscriber<T>(s, value, kind));
    }

    onErrorResume(handler: resume.ErrorResumeHandler<T>) : Mono<T> {
        return new MonoLift<T, T>(this, s => new resume.OnErrorResumeSubscriber<T>(s, handler));
    }

    delaySubscription(delay: number, scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Mono<T> {
        return new MonoDelaySubscription<T>(this, delay, scheduler);
    }

    /** Delays the value, not the subscription; an empty or failing source terminates without delay. */
    delayElement(delay: number, scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Mono<T> {
        return this.flatMap(t => Mono.just(t).delaySubscription(delay, scheduler));
    }

    subscribeOn(scheduler: sch.Scheduler) : Mono<T> {
        return new MonoSubscribeOn<T>(this, scheduler);
    }

    publishOn(scheduler: sch.Scheduler) : Mono<T> {
        return new MonoLift<T, T>(this, s => new schedule.PublishOnSubscriber<T>(s, scheduler.createWorker(), 1));
    }

    // ------------------------------------

    /** Resolves with the value, or with undefined when the Mono completes empty. */
    toPromise() : Promise<T | undefined> {
        return new Promise<T | undefined>((resolve, reject) => {
            let value: T | undefined = undefined;
            this.subscribe(v => { value = v; }, reject, () => resolve(value));
        });
    }

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

/**
 * Applies an operator subscriber to the source; the lifter runs per
 * subscription, so any state it creates is never shared.
 */
export class MonoLift<T, R> extends Mono<R> {

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

class MonoJust<T> extends Mono<T> implements flow.ScalarCallable<T> {

    constructor(private value: T) {
        super();
    }

    isScalar() : void { }

    call() : T {
        return this.value;
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        s.onSubscribe(new sp.ScalarSubscription<T>(this.value, s));
    }
}

class MonoEmpty<T> extends Mono<T> implements flow.ScalarCallable<T> {

    isScalar() : void { }

    call() : T | null {
        return null;
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        sp.EmptySubscription.complete(s);
    }
}

class MonoNever<T> extends Mono<T> {

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        s.onSubscribe(sp.EmptySubscription.INSTANCE);
    }
}

class MonoError<T> extends Mono<T> {

    constructor(private error: Error) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        sp.EmptySubscription.error(s, this.error);
    }
}

class MonoFromSupplier<T> extends Mono<T> {

    constructor(private supplier: () => T) {
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
            v = this.supplier();
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

class MonoDefer<T> extends Mono<T> {

    constructor(private supplier: () => Mono<T>) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        let p: Mono<T>;
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

class MonoDelay extends Mono<number> {

    constructor(private delay: number, private scheduler: sch.TimedScheduler) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<number>) : void {
        const p = new timed.TimedSubscription(s);
        s.onSubscribe(p);

        p.setFuture(this.scheduler.scheduleDelayed(p.run, this.delay));
    }
}

class MonoZip<R> extends Mono<R> {

    constructor(private assembler: zip.Assembler<R>) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<R>) : void {
        new zip.ZipCoordinator<R>(s, this.assembler, 1).subscribe();
    }
}

class MonoDelaySubscription<T> extends Mono<T> {

    constructor(private source: rs.Publisher<T>, private delay: number, private scheduler: sch.TimedScheduler) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        new timed.DelaySubscriptionSubscriber<T>(s, this.source).start(this.scheduler, this.delay);
    }
}

class MonoSubscribeOn<T> extends Mono<T> {

    constructor(private source: rs.Publisher<T>, private scheduler: sch.Scheduler) {
        super();
    }

    protected subscribeActual(s: rs.Subscriber<T>) : void {
        new schedule.SubscribeOnSubscriber<T>(s, this.scheduler.createWorker()).start(this.source);
    }
}
