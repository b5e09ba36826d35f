import * as rs from './reactive-streams';
import * as sp from './subscription';
import { isDeepStrictEqual } from 'node:util';
import { setTimeout as sleep } from 'node:timers/promises';
import { VirtualTimeScheduler } from './virtual-time-scheduler';
import { getConfig } from './config';
import { type ErrorKind, Exceptions, StepVerificationError } from './errors';
import { type Signal, Signals, format } from './signal';

type Event<T> = { readonly kind: 'subscribe' } | Signal<T>;

function describe(e: Event<unknown>) : string {
    return e.kind === 'subscribe' ? 'onSubscribe()' : Signals.describe(e);
}

/** Records everything the verified publisher emits and hands it out one event at a time. */
class SignalCollector<T> implements rs.Subscriber<T> {

    private events: Array<Event<T>> = [];

    private waiter: (() => void) | null = null;

    private s: rs.Subscription = sp.SH.UNSET;

    constructor(private initialRequest: number) {

    }

    onSubscribe(s: rs.Subscription) : void {
        if (sp.SH.validSubscription(this.s, s)) {
            this.s = s;
            this.push({ kind: 'subscribe' });
            if (this.initialRequest > 0) {
                s.request(this.initialRequest);
            }
        }
    }

    onNext(t: T) : void {
        this.push(Signals.next(t));
    }

    onError(t: Error) : void {
        this.push(Signals.error<T>(t));
    }

    onComplete() : void {
        this.push(Signals.complete<T>());
    }

    private push(e: Event<T>) : void {
        this.events.push(e);
        const w = this.waiter;
        if (w != null) {
            w();
        }
    }

    isSubscribed() : boolean {
        return this.s != sp.SH.UNSET;
    }

    request(n: number) : void {
        this.s.request(n);
    }

    cancel() : void {
        const s = this.s;
        this.s = sp.SH.CANCELLED;
        s.cancel();
    }

    /** The first buffered signal, skipping the subscription event. */
    pendingSignal() : Signal<T> | null {
        for (const e of this.events) {
            if (e.kind !== 'subscribe') {
                return e;
            }
        }
        return null;
    }

    /** Resolves with the next event, or with null when none arrives within `timeout` ms. */
    take(timeout: number) : Promise<Event<T> | null> {
        const e = this.events.shift();
        if (e !== undefined) {
            return Promise.resolve(e);
        }
        return new Promise(resolve => {
            const timer = setTimeout(() => {
                this.waiter = null;
                resolve(null);
            }, timeout);
            this.waiter = () => {
                clearTimeout(timer);
                this.waiter = null;
                resolve(this.events.shift() ?? null);
            };
        });
    }
}

interface Context<T> {
    readonly collector: SignalCollector<T>;
    readonly scheduler: VirtualTimeScheduler | null;
    readonly timeout: number;
}

interface Step<T> {
    readonly description: string;
    /** Steps that end the script: nothing but extra signals is checked after them. */
    readonly terminal: boolean;
    run(ctx: Context<T>) : Promise<void>;
}

function failure(description: string, detail: string) : StepVerificationError {
    return new StepVerificationError(`expectation "${description}" failed (${detail})`);
}

async function nextSignal<T>(ctx: Context<T>, description: string) : Promise<Signal<T>> {
    for (;;) {
        const e = await ctx.collector.take(ctx.timeout);
        if (e == null) {
            throw failure(description, `no signal within ${ctx.timeout}ms`);
        }
        if (e.kind !== 'subscribe') {
            return e;
        }
    }
}

async function advance<T>(ctx: Context<T>, ms: number) : Promise<void> {
    const vts = ctx.scheduler;
    if (vts != null) {
        vts.advanceTimeBy(ms);
    } else if (ms > 0) {
        await sleep(ms);
    }
}

/**
 * A script of expectations about the signals a publisher emits, checked one
 * signal at a time once `verify()` subscribes:
 *
 * ```
 * await StepVerifier.create(Flux.range(5, 3))
 *     .expectNext(5, 6, 7)
 *     .verifyComplete();
 * ```
 *
 * Every step waits up to the verification timeout (`REACTOR_VERIFY_TIMEOUT_MS`,
 * or the value given to `verify`) for its signal. Under `withVirtualTime`
 * the publisher is assembled against a fresh VirtualTimeScheduler, and
 * `thenAwait`/`expectNoEvent` move its clock instead of sleeping.
 */
export class StepVerifier<T> {

    private steps: Array<Step<T>> = [];

    private constructor(
            private assemble: (scheduler: VirtualTimeScheduler | null) => rs.Publisher<T>,
            private virtual: boolean,
            private initialRequest: number) {

    }

    static create<T>(publisher: rs.Publisher<T>, initialRequest: number = Infinity) : StepVerifier<T> {
        return new StepVerifier<T>(() => publisher, false, initialRequest);
    }

    static withVirtualTime<T>(supplier: (scheduler: VirtualTimeScheduler) => rs.Publisher<T>,
            initialRequest: number = Infinity) : StepVerifier<T> {
        return new StepVerifier<T>(vts => supplier(vts ?? VirtualTimeScheduler.create()), true, initialRequest);
    }

    private add(description: string, run: (ctx: Context<T>) => Promise<void>, terminal: boolean = false) : this {
        this.steps.push({ description, run, terminal });
        return this;
    }

    private expectSignal(description: string, check: (signal: Signal<T>) => string | null, terminal: boolean = false) : this {
        return this.add(description, async ctx => {
            const problem = check(await nextSignal(ctx, description));
            if (problem != null) {
                throw failure(description, problem);
            }
        }, terminal);
    }

    // ------------------------------------

    expectSubscription() : this {
        const description = 'expectSubscription';
        return this.add(description, async ctx => {
            const e = await ctx.collector.take(ctx.timeout);
            if (e == null) {
                throw failure(description, `no subscription within ${ctx.timeout}ms`);
            }
            if (e.kind !== 'subscribe') {
                throw failure(description, `expected: onSubscribe(); actual: ${describe(e)}`);
            }
        });
    }

    /** One step per value, each compared by deep equality. */
    expectNext(...values: T[]) : this {
        for (const v of values) {
            this.expectSignal(`expectNext(${format(v)})`, signal => {
                if (signal.kind !== 'next') {
                    return `expected: onNext(${format(v)}); actual: ${Signals.describe(signal)}`;
                }
                if (!isDeepStrictEqual(signal.value, v)) {
                    return `expected value: ${format(v)}; actual value: ${format(signal.value)}`;
                }
                return null;
            });
        }
        return this;
    }

    expectNextCount(n: number) : this {
        const description = `expectNextCount(${n})`;
        return this.add(description, async ctx => {
            for (let i = 0; i < n; i++) {
                const signal = await nextSignal(ctx, description);
                if (signal.kind !== 'next') {
                    throw failure(description, `expected: count = ${n}; actual: count = ${i}; signal: ${Signals.describe(signal)}`);
                }
            }
        });
    }

    expectNextMatches(predicate: (t: T) => boolean) : this {
        return this.expectSignal('expectNextMatches', signal => {
            if (signal.kind !== 'next') {
                return `expected: onNext(); actual: ${Signals.describe(signal)}`;
            }
            return predicate(signal.value) ? null : `predicate failed on value: ${format(signal.value)}`;
        });
    }

    /** Runs `assertion` against the next value; whatever it throws fails the step. */
    assertNext(assertion: (t: T) => void) : this {
        return this.expectSignal('assertNext', signal => {
            if (signal.kind !== 'next') {
                return `expected: onNext(); actual: ${Signals.describe(signal)}`;
            }
            try {
                assertion(signal.value);
            } catch (ex) {
                return Exceptions.propagate(ex).message;
            }
            return null;
        });
    }

    /** Lets `ms` pass and fails if any signal shows up meanwhile (or was already waiting). */
    expectNoEvent(ms: number) : this {
        const description = `expectNoEvent(${ms})`;
        return this.add(description, async ctx => {
            await advance(ctx, ms);
            const pending = ctx.collector.pendingSignal();
            if (pending != null) {
                throw failure(description, `expected no event; actual: ${Signals.describe(pending)}`);
            }
        });
    }

    thenRequest(n: number) : this {
        return this.add(`thenRequest(${n})`, async ctx => {
            ctx.collector.request(n);
        });
    }

    thenAwait(ms: number = 0) : this {
        return this.add(`thenAwait(${ms})`, ctx => advance(ctx, ms));
    }

    then(task: () => void) : this {
        const description = 'then';
        return this.add(description, async () => {
            try {
                task();
            } catch (ex) {
                throw failure(description, Exceptions.propagate(ex).message);
            }
        });
    }

    thenCancel() : this {
        return this.add('thenCancel', async ctx => {
            ctx.collector.cancel();
        }, true);
    }

    expectComplete() : this {
        return this.expectSignal('expectComplete', signal =>
            signal.kind === 'complete' ? null : `expected: onComplete(); actual: ${Signals.describe(signal)}`, true);
    }

    /** Expects an error, optionally of the given kind. */
    expectError(kind?: ErrorKind) : this {
        const description = kind === undefined ? 'expectError' : `expectError(${kind})`;
        return this.expectSignal(description, signal => {
            if (signal.kind !== 'error') {
                return `expected: onError(); actual: ${Signals.describe(signal)}`;
            }
            const actual = Exceptions.kindOf(signal.error);
            if (kind !== undefined && actual != kind) {
                return `expected error of kind: ${kind}; actual kind: ${actual}`;
            }
            return null;
        }, true);
    }

    expectErrorMessage(message: string) : this {
        return this.expectSignal(`expectErrorMessage(${message})`, signal => {
            if (signal.kind !== 'error') {
                return `expected: onError(); actual: ${Signals.describe(signal)}`;
            }
            if (signal.error.message != message) {
                return `expected message: ${message}; actual message: ${signal.error.message}`;
            }
            return null;
        }, true);
    }

    expectErrorMatches(predicate: (e: Error) => boolean) : this {
        return this.expectSignal('expectErrorMatches', signal => {
            if (signal.kind !== 'error') {
                return `expected: onError(); actual: ${Signals.describe(signal)}`;
            }
            return predicate(signal.error) ? null : `predicate failed on error: ${format(signal.error)}`;
        }, true);
    }

    // ------------------------------------

    /**
     * Subscribes and runs the script. Resolves with the elapsed wall-clock
     * time in ms; rejects with a StepVerificationError on the first mismatch.
     * A script without a terminal expectation cancels the subscription at
     * its end.
     */
    async verify(timeout: number = getConfig().verifyTimeoutMs) : Promise<number> {
        const start = Date.now();
        const scheduler = this.virtual ? VirtualTimeScheduler.create() : null;
        const collector = new SignalCollector<T>(this.initialRequest);
        const ctx: Context<T> = { collector, scheduler, timeout };

        try {
            this.assemble(scheduler).subscribe(collector);

            let last: Step<T> | null = null;
            for (const step of this.steps) {
                await step.run(ctx);
                last = step;
                if (step.terminal) {
                    break;
                }
            }

            if (last != null && last.terminal) {
                const extra = collector.pendingSignal();
                if (extra != null) {
                    throw failure(last.description, `unexpected signal after the end: ${Signals.describe(extra)}`);
                }
            }
        } finally {
            collector.cancel();
            if (scheduler != null) {
                scheduler.dispose();
            }
        }

        return Date.now() - start;
    }

    verifyComplete(timeout?: number) : Promise<number> {
        return this.expectComplete().verify(timeout);
    }

    verifyError(kind?: ErrorKind, timeout?: number) : Promise<number> {
        return this.expectError(kind).verify(timeout);
    }

    verifyErrorMessage(message: string, timeout?: number) : Promise<number> {
        return this.expectErrorMessage(message).verify(timeout);
    }
}
