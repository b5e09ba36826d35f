import { describe, it, expect, afterEach } from 'vitest';
import { Flux, DirectProcessor, UnicastProcessor, naturalOrder } from './flux';
import { Mono } from './mono';
import { Schedulers, type TimedScheduler } from './scheduler';
import { StepVerifier } from './step-verifier';
import { TimeoutError, UpstreamError } from './errors';
import { format } from './signal';

describe('Flux sources', () => {
    it('range emits count integers from start', async () => {
        await StepVerifier.create(Flux.range(1, 5))
            .expectNext(1, 2, 3, 4, 5)
            .verifyComplete();
    });

    it('range rejects a negative count', () => {
        expect(() => Flux.range(1, -1)).toThrow(RangeError);
    });

    it('range of zero completes empty', async () => {
        await StepVerifier.create(Flux.range(3, 0)).verifyComplete();
    });

    it('just rejects null values at assembly', () => {
        expect(() => Flux.just<string | null>('a', null)).toThrow(TypeError);
    });

    it('fromIterable walks the iterable anew for every subscriber', async () => {
        const source = Flux.fromIterable(new Set(['x', 'y']));
        expect(await source.collectList().toPromise()).toEqual(['x', 'y']);
        expect(await source.collectList().toPromise()).toEqual(['x', 'y']);
    });

    it('fromCallable with a null result completes empty', async () => {
        await StepVerifier.create(Flux.fromCallable<string | null>(() => null)).verifyComplete();
    });

    it('defer calls the supplier once per subscription', async () => {
        let calls = 0;
        const source = Flux.defer(() => Flux.just(++calls));
        await StepVerifier.create(source).expectNext(1).verifyComplete();
        await StepVerifier.create(source).expectNext(2).verifyComplete();
    });

    it('error terminates right after subscription', async () => {
        await StepVerifier.create(Flux.error<number>(new UpstreamError('down')))
            .expectSubscription()
            .verifyErrorMessage('down');
    });

    it('interval ticks on the virtual clock', async () => {
        await StepVerifier.withVirtualTime(s => Flux.interval(100, 100, s).take(3))
            .expectSubscription()
            .expectNoEvent(99)
            .thenAwait(1)
            .expectNext(0)
            .thenAwait(200)
            .expectNext(1, 2)
            .verifyComplete();
    });

    it('timer emits 0 once the delay elapses', async () => {
        await StepVerifier.withVirtualTime(s => Flux.timer(50, s))
            .thenAwait(50)
            .expectNext(0)
            .verifyComplete();
    });
});

describe('Flux backpressure', () => {
    it('emits no more than requested', async () => {
        await StepVerifier.create(Flux.range(1, 10), 0)
            .expectSubscription()
            .thenRequest(2)
            .expectNext(1, 2)
            .thenRequest(1)
            .expectNext(3)
            .thenCancel()
            .verify();
    });

    it('take caps the demand forwarded upstream', async () => {
        const requests: number[] = [];
        await StepVerifier.create(Flux.range(1, 100).doOnRequest(n => { requests.push(n); }).take(3))
            .expectNext(1, 2, 3)
            .verifyComplete();
        expect(requests).toEqual([3]);
    });

    it('take cancels the source after the last value', async () => {
        let cancelled = false;
        await StepVerifier.create(Flux.range(1, 100).doOnCancel(() => { cancelled = true; }).take(2))
            .expectNext(1, 2)
            .verifyComplete();
        expect(cancelled).toBe(true);
    });
});

describe('Flux transformations', () => {
    it('maps and filters in order', async () => {
        await StepVerifier.create(Flux.range(1, 5).map(i => i * 10).filter(i => i != 30))
            .expectNext(10, 20, 40, 50)
            .verifyComplete();
    });

    it('a throwing mapper fails the sequence with a computation error', async () => {
        const source = Flux.just(1, 2, 3).map(i => {
            if (i == 2) {
                throw new Error('boom');
            }
            return i;
        });
        await StepVerifier.create(source)
            .expectNext(1)
            .verifyError('computation');
    });

    it('skip drops the first values', async () => {
        await StepVerifier.create(Flux.range(1, 5).skip(2))
            .expectNext(3, 4, 5)
            .verifyComplete();
    });

    it('takeWhile completes at the first value failing the predicate', async () => {
        await StepVerifier.create(Flux.range(1, 10).takeWhile(i => i < 3))
            .expectNext(1, 2)
            .verifyComplete();
    });

    it('distinct compares the selected keys', async () => {
        await StepVerifier.create(Flux.just('apple', 'avocado', 'banana', 'blueberry', 'cherry').distinct(s => s.charAt(0)))
            .expectNext('apple', 'banana', 'cherry')
            .verifyComplete();
    });

    it('buffer emits the remainder on completion', async () => {
        await StepVerifier.create(Flux.range(1, 7).buffer(3))
            .expectNext([1, 2, 3], [4, 5, 6], [7])
            .verifyComplete();
    });

    it('window splits into consecutive sub-sequences', async () => {
        await StepVerifier.create(Flux.range(1, 5).window(2).concatMap(w => w.collectList()))
            .expectNext([1, 2], [3, 4], [5])
            .verifyComplete();
    });

    it('window takes any size', async () => {
        await StepVerifier.create(Flux.range(1, 7).window(3).concatMap(w => w.collectList()))
            .expectNext([1, 2, 3], [4, 5, 6], [7])
            .verifyComplete();
    });

    it('groupBy routes values to the group of their key', async () => {
        const grouped = Flux.just('ant', 'bee', 'asp', 'bat', 'cow')
            .groupBy(w => w.charAt(0))
            .flatMap(g => g.collectList().map(list => g.key() + format(list)))
            .sort();
        await StepVerifier.create(grouped)
            .expectNext('a[ant, asp]', 'b[bee, bat]', 'c[cow]')
            .verifyComplete();
    });

    it('flatMapIterable flattens in order', async () => {
        await StepVerifier.create(Flux.just(1, 2).flatMapIterable(i => [i, i * 10]))
            .expectNext(1, 10, 2, 20)
            .verifyComplete();
    });

    it('startWith prepends values', async () => {
        await StepVerifier.create(Flux.just(1, 2, 3).startWith(-1, 0))
            .expectNext(-1, 0, 1, 2, 3)
            .verifyComplete();
    });

    it('materialize turns every signal into a value', async () => {
        const signals = await Flux.just('a').materialize().collectList().toPromise();
        expect(signals).toEqual([{ kind: 'next', value: 'a' }, { kind: 'complete' }]);
    });
});

describe('Flux reductions', () => {
    it('reduce without a seed folds from the first value', async () => {
        expect(await Flux.range(1, 4).reduce((a, b) => a + b).toPromise()).toBe(10);
    });

    it('reduce with a seed', async () => {
        expect(await Flux.range(1, 4).reduce('', (s, i) => s + i).toPromise()).toBe('1234');
    });

    it('reduce without a seed of an empty source completes empty', async () => {
        expect(await Flux.empty<number>().reduce((a, b) => a + b).toPromise()).toBeUndefined();
    });

    it('count counts the values', async () => {
        expect(await Flux.just('a', 'b', 'c').count().toPromise()).toBe(3);
    });

    it('collectSortedList uses the natural order by default', async () => {
        expect(await Flux.just(3, 1, 2).collectSortedList().toPromise()).toEqual([1, 2, 3]);
    });

    it('sort takes a comparator', async () => {
        await StepVerifier.create(Flux.just(3, 1, 2).sort((a, b) => b - a))
            .expectNext(3, 2, 1)
            .verifyComplete();
    });

    it('next takes the first value only', async () => {
        expect(await Flux.range(7, 3).next().toPromise()).toBe(7);
    });

    it('naturalOrder compares numbers numerically and strings lexically', () => {
        expect([10, 9, 1].sort(naturalOrder)).toEqual([1, 9, 10]);
        expect(['b', 'a'].sort(naturalOrder)).toEqual(['a', 'b']);
    });
});

describe('Flux combinations', () => {
    it('zip ends with the shorter source', async () => {
        await StepVerifier.create(Flux.zip2(Flux.range(1, 3), Flux.just('a', 'b'), (n, s) => n + s))
            .expectNext('1a', '2b')
            .verifyComplete();
    });

    it('zip over an array of sources', async () => {
        await StepVerifier.create(Flux.zip([Flux.just(1, 2), Flux.just(10, 20), Flux.just(100, 200)], v => v.reduce((a, b) => a + b)))
            .expectNext(111, 222)
            .verifyComplete();
    });

    it('merge of synchronous sources keeps subscription order', async () => {
        await StepVerifier.create(Flux.mergeArray(Flux.just(1, 2), Flux.just(3, 4)))
            .expectNext(1, 2, 3, 4)
            .verifyComplete();
    });

    it('concat subscribes to the next source after the previous completes', async () => {
        await StepVerifier.create(Flux.just(1, 2).concatWith(Flux.range(3, 2)))
            .expectNext(1, 2, 3, 4)
            .verifyComplete();
    });

    it('an error in a concatenated source stops the sequence', async () => {
        await StepVerifier.create(Flux.concatArray(Flux.just(1), Flux.error<number>(new UpstreamError('gone')), Flux.just(2)))
            .expectNext(1)
            .verifyErrorMessage('gone');
    });
});

describe('Flux error handling', () => {
    it('onErrorReturn replaces an error of the given kind', async () => {
        await StepVerifier.create(Flux.error<number>(new TimeoutError(5)).onErrorReturn(-1, 'timeout'))
            .expectNext(-1)
            .verifyComplete();
    });

    it('onErrorReturn lets errors of other kinds through', async () => {
        await StepVerifier.create(Flux.error<number>(new UpstreamError('down')).onErrorReturn(-1, 'computation'))
            .verifyError('upstream');
    });

    it('onErrorResume dispatches on the kind of the error', async () => {
        const source = Flux.just(1).concatWith(Flux.error<number>(new UpstreamError('down')))
            .onErrorResume({ upstream: () => Flux.just(9), computation: () => Flux.just(0) });
        await StepVerifier.create(source)
            .expectNext(1, 9)
            .verifyComplete();
    });

    it('onErrorResume without a matching entry propagates the error', async () => {
        await StepVerifier.create(Flux.error<number>(new TimeoutError(5)).onErrorResume({ upstream: () => Flux.just(9) }))
            .verifyError('timeout');
    });

    it('timeout fails when the next value is late', async () => {
        await StepVerifier.withVirtualTime(s => Flux.never<number>().timeout(100, s))
            .expectSubscription()
            .expectNoEvent(99)
            .thenAwait(1)
            .verifyError('timeout');
    });

    it('timeout switches to the fallback', async () => {
        await StepVerifier.withVirtualTime(s => Flux.never<number>().timeout(100, Flux.just(1, 2), s))
            .thenAwait(100)
            .expectNext(1, 2)
            .verifyComplete();
    });
});

describe('Flux timing', () => {
    it('delayElements spaces the values on the virtual clock', async () => {
        await StepVerifier.withVirtualTime(s => Flux.just('a', 'b').delayElements(10, s))
            .expectSubscription()
            .expectNoEvent(10 - 1)
            .thenAwait(1)
            .expectNext('a')
            .thenAwait(10)
            .expectNext('b')
            .verifyComplete();
    });

    it('delaySubscription postpones the subscription to the source', async () => {
        let subscribed = false;
        await StepVerifier.withVirtualTime(s => Flux.just(1).doOnSubscribe(() => { subscribed = true; }).delaySubscription(30, s))
            .then(() => { expect(subscribed).toBe(false); })
            .thenAwait(30)
            .expectNext(1)
            .verifyComplete();
        expect(subscribed).toBe(true);
    });

    it('combineLatest pairs each value with the latest of the other source', async () => {
        await StepVerifier.withVirtualTime(s => Flux.combineLatest2(
                Flux.just('x', 'y').delayElements(10, s),
                Flux.just(1).delayElements(15, s),
                (l, d) => l + d))
            .thenAwait(15)
            .expectNext('x1')
            .thenAwait(5)
            .expectNext('y1')
            .verifyComplete();
    });

    it('flatMap emits the inner values as they arrive', async () => {
        await StepVerifier.withVirtualTime(s => Flux.just(30, 10, 20).flatMap(d => Mono.just(d).delayElement(d, s)))
            .expectSubscription()
            .thenAwait(10)
            .expectNext(10)
            .thenAwait(10)
            .expectNext(20)
            .thenAwait(10)
            .expectNext(30)
            .verifyComplete();
    });

    it('concatMap keeps the order of the source', async () => {
        await StepVerifier.withVirtualTime(s => Flux.just(30, 10, 20).concatMap(d => Mono.just(d).delayElement(d, s)))
            .expectSubscription()
            .thenAwait(30)
            .expectNext(30)
            .thenAwait(10)
            .expectNext(10)
            .thenAwait(20)
            .expectNext(20)
            .verifyComplete();
    });
});

describe('Flux scheduling', () => {
    const created: TimedScheduler[] = [];

    function single(name: string) : TimedScheduler {
        const s = Schedulers.newSingle(name);
        created.push(s);
        return s;
    }

    afterEach(() => {
        for (const s of created.splice(0)) {
            s.dispose();
        }
    });

    it('the subscribeOn closest to the source wins', async () => {
        const contexts = await Flux.range(1, 2)
            .map(() => Schedulers.currentContextName())
            .subscribeOn(single('inner'))
            .subscribeOn(single('outer'))
            .collectList()
            .toPromise();
        expect(contexts).toEqual(['inner-1', 'inner-1']);
    });

    it('each publishOn switches the context of what follows it', async () => {
        const hops = await Flux.range(1, 2)
            .publishOn(single('p1'))
            .map(() => Schedulers.currentContextName())
            .publishOn(single('p2'))
            .map(first => first + '>' + Schedulers.currentContextName())
            .collectList()
            .toPromise();
        expect(hops).toEqual(['p1-1>p2-1', 'p1-1>p2-1']);
    });

    it('publishOn takes a prefetch that is not a power of two', async () => {
        const values = await Flux.range(1, 5).publishOn(single('pf'), 3).collectList().toPromise();
        expect(values).toEqual([1, 2, 3, 4, 5]);
    });
});

describe('DirectProcessor', () => {
    it('relays signals to its subscribers', async () => {
        const p = new DirectProcessor<number>();
        await StepVerifier.create(p)
            .then(() => {
                p.onNext(1);
                p.onNext(2);
                p.onComplete();
            })
            .expectNext(1, 2)
            .verifyComplete();
    });

    it('fails a subscriber that has not requested and drops it', async () => {
        const p = new DirectProcessor<number>();
        await StepVerifier.create(p, 0)
            .then(() => { p.onNext(1); })
            .verifyErrorMessage('Could not emit value through the DirectProcessor due to lack of requests');
        expect(p.hasSubscribers()).toBe(false);
    });

    it('replays the terminal signal to late subscribers', async () => {
        const p = new DirectProcessor<number>();
        p.onError(new UpstreamError('closed'));
        await StepVerifier.create(p).verifyErrorMessage('closed');
    });
});

describe('UnicastProcessor', () => {
    it('buffers until its subscriber arrives', async () => {
        const p = new UnicastProcessor<number>();
        p.onNext(1);
        p.onNext(2);
        p.onComplete();
        await StepVerifier.create(p)
            .expectNext(1, 2)
            .verifyComplete();
    });

    it('rejects a second subscriber', async () => {
        const p = new UnicastProcessor<number>();
        p.onComplete();
        await StepVerifier.create(p).verifyComplete();
        await StepVerifier.create(p).verifyErrorMessage('This processor allows only a single Subscriber');
    });

    it('calls onCancel when its subscriber cancels', async () => {
        let cancelled = 0;
        const p = new UnicastProcessor<number>(16, () => { cancelled++; });
        await StepVerifier.create(p).thenCancel().verify();
        expect(cancelled).toBe(1);
    });
});

describe('Flux.subscribe', () => {
    it('returns a disposable lambda subscriber', () => {
        const seen: number[] = [];
        let completed = false;
        const ls = Flux.range(1, 3).subscribe(v => { seen.push(v); }, undefined, () => { completed = true; });
        expect(seen).toEqual([1, 2, 3]);
        expect(completed).toBe(true);
        expect(ls.isDisposed()).toBe(true);
    });

    it('from returns a Flux as is and wraps other publishers', async () => {
        const f = Flux.just(1, 2);
        expect(Flux.from(f)).toBe(f);
        await StepVerifier.create(Flux.from(Mono.just(5))).expectNext(5).verifyComplete();
    });
});
