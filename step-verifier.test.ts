import { describe, it, expect } from 'vitest';
import { StepVerifier } from './step-verifier';
import { Flux } from './flux';
import { Mono } from './mono';
import { StepVerificationError, UpstreamError } from './errors';

async function failureOf(verification: Promise<number>) : Promise<string> {
    try {
        await verification;
    } catch (ex) {
        if (ex instanceof StepVerificationError) {
            return ex.message;
        }
        throw ex;
    }
    throw new Error('the verification passed');
}

describe('StepVerifier', () => {
    it('resolves with the elapsed time when the script matches', async () => {
        const elapsed = await StepVerifier.create(Flux.just('a', 'b'))
            .expectSubscription()
            .expectNext('a')
            .expectNextMatches(v => v == 'b')
            .verifyComplete();
        expect(elapsed).toBeGreaterThanOrEqual(0);
    });

    it('reports a value that differs', async () => {
        expect(await failureOf(StepVerifier.create(Flux.just(1, 2)).expectNext(1, 3).verifyComplete()))
            .toBe('expectation "expectNext(3)" failed (expected value: 3; actual value: 2)');
    });

    it('reports a terminal signal where a value was expected', async () => {
        expect(await failureOf(StepVerifier.create(Flux.just(1)).expectNext(1, 2).verifyComplete()))
            .toBe('expectation "expectNext(2)" failed (expected: onNext(2); actual: onComplete())');
    });

    it('reports a value where completion was expected', async () => {
        expect(await failureOf(StepVerifier.create(Flux.just(1, 2)).expectNext(1).verifyComplete()))
            .toBe('expectation "expectComplete" failed (expected: onComplete(); actual: onNext(2))');
    });

    it('compares arrays by content', async () => {
        await StepVerifier.create(Flux.just([1, 2], [3]))
            .expectNext([1, 2], [3])
            .verifyComplete();
    });

    it('reports an error of the wrong kind', async () => {
        expect(await failureOf(StepVerifier.create(Flux.error<number>(new UpstreamError('x'))).verifyError('timeout')))
            .toBe('expectation "expectError(timeout)" failed (expected error of kind: timeout; actual kind: upstream)');
    });

    it('reports an error with the wrong message', async () => {
        expect(await failureOf(StepVerifier.create(Mono.error<number>(new UpstreamError('b'))).verifyErrorMessage('a')))
            .toBe('expectation "expectErrorMessage(a)" failed (expected message: a; actual message: b)');
    });

    it('gives up on a signal that does not arrive in time', async () => {
        expect(await failureOf(StepVerifier.create(Flux.never<number>()).expectNext(1).verify(20)))
            .toBe('expectation "expectNext(1)" failed (no signal within 20ms)');
    });

    it('reports how many values arrived before the sequence ended', async () => {
        expect(await failureOf(StepVerifier.create(Flux.range(1, 3)).expectNextCount(5).verifyComplete()))
            .toBe('expectation "expectNextCount(5)" failed (expected: count = 5; actual: count = 3; signal: onComplete())');
    });

    it('reports a value failing the predicate', async () => {
        expect(await failureOf(StepVerifier.create(Flux.just(4)).expectNextMatches(v => v % 2 == 1).verifyComplete()))
            .toBe('expectation "expectNextMatches" failed (predicate failed on value: 4)');
    });

    it('reports what an assertion threw', async () => {
        const verification = StepVerifier.create(Flux.just(1))
            .assertNext(v => {
                if (v != 2) {
                    throw new Error('not two');
                }
            })
            .verifyComplete();
        expect(await failureOf(verification)).toBe('expectation "assertNext" failed (not two)');
    });

    it('reports what a task threw', async () => {
        const verification = StepVerifier.create(Flux.never<number>())
            .then(() => { throw new Error('oops'); })
            .verify();
        expect(await failureOf(verification)).toBe('expectation "then" failed (oops)');
    });

    it('reports a signal during a quiet period', async () => {
        const verification = StepVerifier.withVirtualTime(s => Flux.just(1).delayElements(10, s))
            .expectNoEvent(20)
            .verifyComplete();
        expect(await failureOf(verification)).toBe('expectation "expectNoEvent(20)" failed (expected no event; actual: onNext(1))');
    });

    it('reports signals left over after the end of the script', async () => {
        expect(await failureOf(StepVerifier.create(Flux.just(1, 2)).expectNext(1).thenCancel().verify()))
            .toBe('expectation "thenCancel" failed (unexpected signal after the end: onNext(2))');
    });

    it('cancels the subscription of a script without a terminal step', async () => {
        let cancelled = false;
        await StepVerifier.create(Flux.never<number>().doOnCancel(() => { cancelled = true; }))
            .expectSubscription()
            .verify();
        expect(cancelled).toBe(true);
    });

    it('moves virtual time instead of waiting', async () => {
        const elapsed = await StepVerifier.withVirtualTime(s => Mono.just('x').delaySubscription(60_000, s))
            .thenAwait(60_000)
            .expectNext('x')
            .verifyComplete();
        expect(elapsed).toBeLessThan(60_000);
    });

    it('requests only what the script asks for', async () => {
        await StepVerifier.create(Flux.range(1, 5), 1)
            .expectNext(1)
            .expectNoEvent(10)
            .thenRequest(4)
            .expectNext(2, 3, 4, 5)
            .verifyComplete();
    });
});
