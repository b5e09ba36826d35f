import { describe, it, expect, afterEach } from 'vitest';
import { Mono } from './mono';
import { Flux } from './flux';
import { Schedulers, type TimedScheduler } from './scheduler';
import { StepVerifier } from './step-verifier';
import { UpstreamError } from './errors';

describe('Mono sources', () => {
    it('just emits its value and completes', async () => {
        await StepVerifier.create(Mono.just('hello'))
            .expectNext('hello')
            .verifyComplete();
    });

    it('just rejects null', () => {
        expect(() => Mono.just<string | null>(null)).toThrow(TypeError);
    });

    it('justOrEmpty of null completes empty', async () => {
        expect(await Mono.justOrEmpty<string>(null).toPromise()).toBeUndefined();
    });

    it('fromSupplier calls the supplier once per subscription', async () => {
        let calls = 0;
        const m = Mono.fromSupplier(() => ++calls);
        expect(await m.toPromise()).toBe(1);
        expect(await m.toPromise()).toBe(2);
    });

    it('a throwing supplier fails with a computation error', async () => {
        await StepVerifier.create(Mono.fromSupplier<number>(() => { throw new Error('nope'); }))
            .expectErrorMatches(e => e.name == 'ComputationError' && e.message == 'nope')
            .verify();
    });

    it('defer assembles a new Mono per subscription', async () => {
        let n = 0;
        const m = Mono.defer(() => Mono.just(n += 10));
        expect(await m.toPromise()).toBe(10);
        expect(await m.toPromise()).toBe(20);
    });

    it('delay emits 0 on the virtual clock', async () => {
        await StepVerifier.withVirtualTime(s => Mono.delay(100, s))
            .expectSubscription()
            .expectNoEvent(100 - 1)
            .thenAwait(1)
            .expectNext(0)
            .verifyComplete();
    });
});

describe('Mono operators', () => {
    it('map transforms the value', async () => {
        expect(await Mono.just(21).map(i => i * 2).toPromise()).toBe(42);
    });

    it('a mapper returning null fails the Mono', async () => {
        await StepVerifier.create(Mono.just(1).map<string | null>(() => null))
            .verifyErrorMessage('The mapper returned a null value');
    });

    it('filter turns a rejected value into an empty Mono', async () => {
        await StepVerifier.create(Mono.just(4).filter(i => i > 5)).verifyComplete();
    });

    it('flatMap chains a dependent Mono', async () => {
        expect(await Mono.just(2).flatMap(i => Mono.just(i * 3)).toPromise()).toBe(6);
    });

    it('flatMapMany expands into a Flux', async () => {
        await StepVerifier.create(Mono.just(3).flatMapMany(n => Flux.range(1, n)))
            .expectNext(1, 2, 3)
            .verifyComplete();
    });

    it('zipWith pairs both values into a tuple', async () => {
        expect(await Mono.just(1).zipWith(Mono.just('a')).toPromise()).toEqual([1, 'a']);
    });

    it('zipWith applies the combiner', async () => {
        expect(await Mono.just('Ada').zipWith(Mono.just('Lovelace'), (a, b) => a + ' ' + b).toPromise()).toBe('Ada Lovelace');
    });

    it('zipWith an empty Mono completes empty', async () => {
        await StepVerifier.create(Mono.just(1).zipWith(Mono.empty<number>())).verifyComplete();
    });

    it('flux views the Mono as a Flux', async () => {
        expect(await Mono.just(5).flux().count().toPromise()).toBe(1);
    });

    it('doOnNext and doOnComplete see the signals', async () => {
        const seen: string[] = [];
        await Mono.just('v')
            .doOnNext(v => { seen.push('next ' + v); })
            .doOnComplete(() => { seen.push('complete'); })
            .toPromise();
        expect(seen).toEqual(['next v', 'complete']);
    });
});

describe('Mono error handling', () => {
    it('toPromise rejects with the error', async () => {
        await expect(Mono.error<number>(new UpstreamError('offline')).toPromise()).rejects.toThrow('offline');
    });

    it('onErrorReturn replaces the error', async () => {
        expect(await Mono.error<string>(new UpstreamError('x')).onErrorReturn('Default').toPromise()).toBe('Default');
    });

    it('onErrorResume takes the fallback from the error', async () => {
        const m = Mono.error<string>(new UpstreamError('from upstream')).onErrorResume(e => Mono.just(e.message));
        expect(await m.toPromise()).toBe('from upstream');
    });

    it('onErrorResume falls back to otherwise when no kind matches', async () => {
        const m = Mono.error<string>(new UpstreamError('x')).onErrorResume({
            timeout: () => Mono.just('timed out'),
            otherwise: () => Mono.just('other'),
        });
        expect(await m.toPromise()).toBe('other');
    });

    it('doOnError sees the error before it propagates', async () => {
        const errors: string[] = [];
        await StepVerifier.create(Mono.error<number>(new UpstreamError('bad')).doOnError(e => { errors.push(e.message); }))
            .verifyError('upstream');
        expect(errors).toEqual(['bad']);
    });
});

describe('Mono timing', () => {
    it('timeout fails a Mono that is too slow', async () => {
        await StepVerifier.withVirtualTime(s => Mono.never<string>().timeout(10, s))
            .thenAwait(10)
            .verifyErrorMessage('Did not observe any item or terminal signal within 10ms (and no fallback has been configured)');
    });

    it('timeout switches to the fallback Mono', async () => {
        await StepVerifier.withVirtualTime(s => Mono.never<string>().timeout(10, Mono.just('late'), s))
            .thenAwait(10)
            .expectNext('late')
            .verifyComplete();
    });

    it('timeout lets a value arriving in time through', async () => {
        await StepVerifier.withVirtualTime(s => Mono.just(1).delayElement(5, s).timeout(10, s))
            .thenAwait(5)
            .expectNext(1)
            .verifyComplete();
    });

    it('delaySubscription postpones the subscription', async () => {
        await StepVerifier.withVirtualTime(s => Mono.just('x').delaySubscription(1000, s))
            .expectSubscription()
            .expectNoEvent(999)
            .thenAwait(1)
            .expectNext('x')
            .verifyComplete();
    });
});

describe('Mono scheduling', () => {
    let scheduler: TimedScheduler | null = null;

    afterEach(() => {
        scheduler?.dispose();
        scheduler = null;
    });

    it('subscribeOn runs the source on a worker', async () => {
        const s = Schedulers.newSingle('sub');
        scheduler = s;
        const name = await Mono.fromSupplier(() => Schedulers.currentContextName()).subscribeOn(s).toPromise();
        expect(name).toBe('sub-1');
    });

    it('publishOn moves the downstream to a worker', async () => {
        const s = Schedulers.newSingle('pub');
        scheduler = s;
        const name = await Mono.just(1).publishOn(s).map(() => Schedulers.currentContextName()).toPromise();
        expect(name).toBe('pub-1');
    });
});
