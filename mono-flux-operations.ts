import { Flux, type GroupedFlux } from './flux';
import { Mono } from './mono';
import * as sch from './scheduler';
import { createLogger, type Logger } from './logger';
import { UpstreamError } from './errors';
import { format } from './signal';

/**
 * One method per demonstrated operator. Each returns a cold publisher that
 * does nothing until subscribed; the time-based ones take the scheduler
 * their timers run on, so tests can hand in a virtual clock.
 */
export class MonoFluxOperations {

    constructor(private logger: Logger = createLogger('catalogue')) {

    }

    /**
     * A single value known at assembly time, replayed to every subscriber.
     * Use `fromSupplier` or `defer` when it must be computed per subscription.
     */
    greeting() : Mono<string> {
        return Mono.just("Hello Reactive!").log('catalogue.greeting', this.logger);
    }

    /**
     * Calls the supplier once per subscription, so two subscribers see two
     * different readings of the high-resolution clock.
     */
    nanoTimeNow() : Mono<bigint> {
        return Mono.fromSupplier(() => process.hrtime.bigint());
    }

    /** `count` consecutive integers from `start`: 5, 6, 7. Finite and synchronous. */
    rangeExample() : Flux<number> {
        return Flux.range(5, 3).log('catalogue.range', this.logger);
    }

    /** One-to-one synchronous mapping; order is kept and a throwing mapper fails the sequence. */
    wordLength(words: Flux<string>) : Flux<number> {
        return words.map(w => w.length).log('catalogue.wordLength', this.logger);
    }

    /**
     * Maps every id to an asynchronous task and merges the results as they
     * arrive, so the output order may differ from the input order.
     */
    flatMapExample(ids: Flux<string>, scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Flux<string> {
        return ids.flatMap(id => Mono.just(id + "-task").delayElement(20, scheduler));
    }

    /** Like `flatMapExample`, but one task at a time, so the input order is kept. */
    concatMapExample(ids: Flux<string>, scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Flux<string> {
        return ids.concatMap(id => Mono.just(id + "-task").delayElement(20, scheduler));
    }

    /** Keeps the even numbers of 1..10; the others are dropped without a trace. */
    filterExample() : Flux<number> {
        return Flux.range(1, 10).filter(i => i % 2 == 0);
    }

    /** Batches of three; the last batch holds whatever is left. */
    bufferExample() : Flux<number[]> {
        return Flux.range(1, 10).buffer(3);
    }

    /** Pairs first and last names by position; ends with the shorter source. */
    fullNameExample() : Flux<string> {
        const firstName = Flux.just("Ada", "Alan");
        const lastName = Flux.just("Lovelace", "Turing");
        return Flux.zip2(firstName, lastName, (a, b) => a + " " + b);
    }

    /**
     * The primary value takes 200 ms, the timeout allows 50 ms, and the
     * resulting TimeoutError is swapped for a fallback value.
     */
    fallback(scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Mono<string> {
        const slow = Mono.just("primary").delayElement(200, scheduler);
        return slow.timeout(50, scheduler)
            .onErrorResume(() => Mono.just("fallback"));
    }

    /** Drops repeats; the seen-set lives with each subscription. */
    distinctExample() : Flux<number> {
        return Flux.fromArray([1, 1, 2, 2, 2, 3, 3, 3, 3]).distinct();
    }

    /** The first three values, after which the source is cancelled. */
    takeExample() : Flux<number> {
        return Flux.range(1, 10).take(3);
    }

    /** Drops the first three values of 1..10. */
    skipExample() : Flux<number> {
        return Flux.range(1, 10).skip(3);
    }

    /** Skips the first two fruit names. */
    skipStringExample() : Flux<string> {
        return Flux.just("Apple", "Banana", "Cranberry", "Dates").skip(2);
    }

    /** Relays values while the predicate holds and completes at the first one failing it. */
    takeWhileExample() : Flux<number> {
        return Flux.range(1, 10).takeWhile(i => i < 5);
    }

    /** Windows of three, each collected back into a list. */
    windowExample() : Flux<number[]> {
        return Flux.range(1, 10).window(3).concatMap(w => w.collectList());
    }

    /**
     * Splits 1..6 into an even and an odd group and renders each as
     * `key[values]`. Groups arrive in the order of their first value, so the
     * rendered groups are sorted to give a fixed output.
     */
    groupBy() : Flux<string> {
        return Flux.range(1, 6)
            .groupBy(i => i % 2 == 0 ? "even" : "odd")
            .flatMap((g: GroupedFlux<string, number>) => g.collectList().map(list => g.key() + format(list)))
            .sort();
    }

    /** Both sources are subscribed at once and their values interleave by arrival time. */
    mergeWithExample(scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Flux<number> {
        return Flux.just(1, 2).delayElements(10, scheduler)
            .mergeWith(Flux.just(3, 4).delayElements(10, scheduler));
    }

    /** The second source is subscribed only after the first completes. */
    concatWithExample(scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Flux<number> {
        return Flux.just(1, 2).delayElements(10, scheduler)
            .concatWith(Flux.just(3, 4).delayElements(10, scheduler));
    }

    /**
     * Letters every 100 ms, digits every 200 ms; each new value is combined
     * with the latest of the other source once both have emitted.
     */
    combineLatestExample(scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Flux<string> {
        const letters = Flux.just("A", "B", "C").delayElements(100, scheduler);
        const digits = Flux.just(1, 2, 3).delayElements(200, scheduler);
        return Flux.combineLatest2(letters, digits, (l, d) => l + d);
    }

    startWithExample() : Flux<number> {
        return Flux.just(1, 2, 3).startWith(0);
    }

    /** Subscribes to the source only after one second. */
    startLate(scheduler: sch.TimedScheduler = sch.Schedulers.parallel()) : Mono<string> {
        return Mono.just("Delay by 1s").delaySubscription(1000, scheduler);
    }

    /** The whole chain, source included, runs on a worker of `scheduler`. */
    subscribeOn(scheduler: sch.Scheduler = sch.Schedulers.parallel()) : Flux<number> {
        return Flux.range(1, 5)
            .map(i => i * 2)
            .subscribeOn(scheduler);
    }

    /** Only the operators after `publishOn` run on a worker of `scheduler`. */
    publishOn(scheduler: sch.Scheduler = sch.Schedulers.parallel()) : Flux<number> {
        return Flux.range(1, 5)
            .publishOn(scheduler)
            .map(i => i * 2 + 1);
    }

    /** A failing source turned into a default value. */
    safeValue() : Mono<string> {
        return Mono.error<string>(new UpstreamError("service unavailable"))
            .onErrorReturn("Default");
    }

    /**
     * Picks the fallback by the kind of the error: the failing supplier
     * raises a computation error, which resumes with "Resume".
     */
    dynamicSafeValue() : Mono<string> {
        return Mono.fromSupplier<string>(() => { throw new Error("lookup failed"); })
            .onErrorResume({
                computation: () => Mono.just("Resume"),
                timeout: () => Mono.just("Timed out"),
            });
    }
}
