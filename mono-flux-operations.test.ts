import { describe, it, expect, afterEach } from 'vitest';
import { MonoFluxOperations } from './mono-flux-operations';
import { Flux } from './flux';
import { Schedulers, type TimedScheduler } from './scheduler';
import { StepVerifier } from './step-verifier';

const ops = new MonoFluxOperations();

describe('MonoFluxOperations', () => {
    let scheduler: TimedScheduler | null = null;

    afterEach(() => {
        scheduler?.dispose();
        scheduler = null;
    });

    it('greeting', async () => {
        await StepVerifier.create(ops.greeting())
            .expectNext('Hello Reactive!')
            .verifyComplete();
    });

    it('nanoTimeNow reads the clock per subscription', async () => {
        const m = ops.nanoTimeNow();
        const first = await m.toPromise();
        const second = await m.toPromise();
        expect(typeof first).toBe('bigint');
        expect(typeof second).toBe('bigint');
        expect(second).toBeGreaterThanOrEqual(first ?? BigInt(0));
    });

    it('rangeExample', async () => {
        await StepVerifier.create(ops.rangeExample())
            .expectNext(5, 6, 7)
            .verifyComplete();
    });

    it('wordLength', async () => {
        await StepVerifier.create(ops.wordLength(Flux.just('Mango', 'Iceapple', 'Sapota', 'Pineapple')))
            .expectNext(5, 8, 6, 9)
            .verifyComplete();
    });

    it('flatMapExample runs the tasks concurrently', async () => {
        await StepVerifier.withVirtualTime(s => ops.flatMapExample(Flux.just('A', 'B', 'C', 'D'), s))
            .expectSubscription()
            .expectNoEvent(19)
            .thenAwait(1)
            .expectNext('A-task', 'B-task', 'C-task', 'D-task')
            .verifyComplete();
    });

    it('concatMapExample runs the tasks one after the other', async () => {
        await StepVerifier.withVirtualTime(s => ops.concatMapExample(Flux.just('A', 'B', 'C'), s))
            .thenAwait(20)
            .expectNext('A-task')
            .expectNoEvent(19)
            .thenAwait(1)
            .expectNext('B-task')
            .thenAwait(20)
            .expectNext('C-task')
            .verifyComplete();
    });

    it('filterExample', async () => {
        await StepVerifier.create(ops.filterExample())
            .expectNext(2, 4, 6, 8, 10)
            .verifyComplete();
    });

    it('bufferExample', async () => {
        await StepVerifier.create(ops.bufferExample())
            .expectNext([1, 2, 3], [4, 5, 6], [7, 8, 9], [10])
            .verifyComplete();
    });

    it('fullNameExample', async () => {
        await StepVerifier.create(ops.fullNameExample())
            .expectNext('Ada Lovelace', 'Alan Turing')
            .verifyComplete();
    });

    it('fallback replaces the timed-out value', async () => {
        await StepVerifier.withVirtualTime(s => ops.fallback(s))
            .expectSubscription()
            .expectNoEvent(49)
            .thenAwait(1)
            .expectNext('fallback')
            .verifyComplete();
    });

    it('distinctExample', async () => {
        await StepVerifier.create(ops.distinctExample())
            .expectNext(1, 2, 3)
            .verifyComplete();
    });

    it('takeExample', async () => {
        await StepVerifier.create(ops.takeExample())
            .expectNext(1, 2, 3)
            .verifyComplete();
    });

    it('skipExample', async () => {
        await StepVerifier.create(ops.skipExample())
            .expectNext(4, 5, 6, 7, 8, 9, 10)
            .verifyComplete();
    });

    it('skipStringExample', async () => {
        await StepVerifier.create(ops.skipStringExample())
            .expectNext('Cranberry', 'Dates')
            .verifyComplete();
    });

    it('takeWhileExample', async () => {
        await StepVerifier.create(ops.takeWhileExample())
            .expectNext(1, 2, 3, 4)
            .verifyComplete();
    });

    it('windowExample', async () => {
        await StepVerifier.create(ops.windowExample())
            .expectNext([1, 2, 3], [4, 5, 6], [7, 8, 9], [10])
            .verifyComplete();
    });

    it('groupBy', async () => {
        await StepVerifier.create(ops.groupBy())
            .expectNext('even[2, 4, 6]', 'odd[1, 3, 5]')
            .verifyComplete();
    });

    it('mergeWithExample interleaves by arrival', async () => {
        await StepVerifier.withVirtualTime(s => ops.mergeWithExample(s))
            .thenAwait(10)
            .expectNext(1, 3)
            .thenAwait(10)
            .expectNext(2, 4)
            .verifyComplete();
    });

    it('concatWithExample keeps the sources apart', async () => {
        await StepVerifier.withVirtualTime(s => ops.concatWithExample(s))
            .thenAwait(20)
            .expectNext(1, 2)
            .thenAwait(20)
            .expectNext(3, 4)
            .verifyComplete();
    });

    it('combineLatestExample', async () => {
        await StepVerifier.withVirtualTime(s => ops.combineLatestExample(s))
            .thenAwait(200)
            .expectNext('A1', 'B1')
            .thenAwait(100)
            .expectNext('C1')
            .thenAwait(300)
            .expectNext('C2', 'C3')
            .verifyComplete();
    });

    it('startWithExample', async () => {
        await StepVerifier.create(ops.startWithExample())
            .expectNext(0, 1, 2, 3)
            .verifyComplete();
    });

    it('startLate subscribes after one second', async () => {
        await StepVerifier.withVirtualTime(s => ops.startLate(s))
            .expectSubscription()
            .expectNoEvent(999)
            .thenAwait(1)
            .expectNext('Delay by 1s')
            .verifyComplete();
    });

    it('subscribeOn', async () => {
        await StepVerifier.withVirtualTime(s => ops.subscribeOn(s))
            .expectNext(2, 4, 6, 8, 10)
            .verifyComplete();
    });

    it('subscribeOn produces on the worker', async () => {
        const s = Schedulers.newParallel('on', 2);
        scheduler = s;
        const contexts = await ops.subscribeOn(s)
            .map(() => Schedulers.currentContextName())
            .distinct()
            .collectList()
            .toPromise();
        expect(contexts).toEqual(['on-1']);
    });

    it('publishOn', async () => {
        const s = Schedulers.newSingle('hop');
        scheduler = s;
        await StepVerifier.create(ops.publishOn(s))
            .expectNext(3, 5, 7, 9, 11)
            .verifyComplete();
    });

    it('safeValue', async () => {
        await StepVerifier.create(ops.safeValue())
            .expectNext('Default')
            .verifyComplete();
    });

    it('dynamicSafeValue resumes by the kind of the error', async () => {
        await StepVerifier.create(ops.dynamicSafeValue())
            .expectNext('Resume')
            .verifyComplete();
    });
});
