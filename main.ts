import * as rs from './reactive-streams';
import * as sch from './scheduler';
import { Flux } from './flux';
import { MonoFluxOperations } from './mono-flux-operations';
import { createLogger, type Logger } from './logger';
import { Signals } from './signal';

/** The signals one catalogue example emitted, rendered as `onNext(5)`, `onComplete()`, ... */
export interface DemoEntry {
    readonly name: string;
    readonly signals: string[];
}

export interface DemoOptions {
    /** Runs the timers and workers of every example; the shared parallel scheduler by default. */
    readonly scheduler?: sch.TimedScheduler;
    readonly logger?: Logger;
}

type Example = (ops: MonoFluxOperations, scheduler: sch.TimedScheduler) => rs.Publisher<unknown>;

const EXAMPLES : ReadonlyArray<readonly [string, Example]> = [
    ['greeting', ops => ops.greeting()],
    ['nanoTimeNow', ops => ops.nanoTimeNow()],
    ['rangeExample', ops => ops.rangeExample()],
    ['wordLength', ops => ops.wordLength(Flux.just("Mango", "Iceapple", "Sapota", "Pineapple"))],
    ['flatMapExample', (ops, s) => ops.flatMapExample(Flux.just("A", "B", "C", "D"), s)],
    ['concatMapExample', (ops, s) => ops.concatMapExample(Flux.just("A", "B", "C"), s)],
    ['filterExample', ops => ops.filterExample()],
    ['bufferExample', ops => ops.bufferExample()],
    ['fullNameExample', ops => ops.fullNameExample()],
    ['fallback', (ops, s) => ops.fallback(s)],
    ['distinctExample', ops => ops.distinctExample()],
    ['takeExample', ops => ops.takeExample()],
    ['skipExample', ops => ops.skipExample()],
    ['skipStringExample', ops => ops.skipStringExample()],
    ['takeWhileExample', ops => ops.takeWhileExample()],
    ['windowExample', ops => ops.windowExample()],
    ['groupBy', ops => ops.groupBy()],
    ['mergeWithExample', (ops, s) => ops.mergeWithExample(s)],
    ['concatWithExample', (ops, s) => ops.concatWithExample(s)],
    ['combineLatestExample', (ops, s) => ops.combineLatestExample(s)],
    ['startWithExample', ops => ops.startWithExample()],
    ['startLate', (ops, s) => ops.startLate(s)],
    ['subscribeOn', (ops, s) => ops.subscribeOn(s)],
    ['publishOn', (ops, s) => ops.publishOn(s)],
    ['safeValue', ops => ops.safeValue()],
    ['dynamicSafeValue', ops => ops.dynamicSafeValue()],
];

export const EXAMPLE_NAMES : ReadonlyArray<string> = EXAMPLES.map(([name]) => name);

function record(source: rs.Publisher<unknown>) : Promise<string[]> {
    return Flux.from(source)
        .materialize()
        .map(Signals.describe)
        .collectList()
        .toPromise()
        .then(signals => signals ?? []);
}

/**
 * Subscribes to every catalogue example at once (or only to those named in
 * `only`), logs what each emitted and resolves once all of them have
 * terminated, in catalogue order.
 */
export async function runDemo(options: DemoOptions = {}, only?: ReadonlyArray<string>) : Promise<DemoEntry[]> {
    const scheduler = options.scheduler ?? sch.Schedulers.parallel();
    const logger = options.logger ?? createLogger('demo');
    const ops = new MonoFluxOperations(logger);

    const selected = only === undefined ? EXAMPLES : EXAMPLES.filter(([name]) => only.includes(name));

    const results = await Promise.all(selected.map(async ([name, example]) => {
        const signals = await record(example(ops, scheduler));
        logger.info({ example: name, signals }, `${name}: ${signals.join(' ')}`);
        return { name, signals };
    }));

    logger.info({ examples: results.length }, 'demo finished');
    return results;
}
