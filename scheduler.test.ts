import { describe, it, expect, afterEach } from 'vitest';
import { Schedulers, TimerScheduler, runInContext } from './scheduler';
import { Disposables } from './flow';
import { Hooks } from './hooks';

describe('Schedulers', () => {
    const created: TimerScheduler[] = [];

    function scheduler(name: string, size: number) : TimerScheduler {
        const s = new TimerScheduler(name, size);
        created.push(s);
        return s;
    }

    afterEach(() => {
        for (const s of created.splice(0)) {
            s.dispose();
        }
        Hooks.resetOnErrorDropped();
    });

    it('immediate runs the task on the caller', () => {
        let ran = false;
        Schedulers.immediate().schedule(() => { ran = true; });
        expect(ran).toBe(true);
    });

    it('the shared schedulers are singletons', () => {
        expect(Schedulers.single()).toBe(Schedulers.single());
        expect(Schedulers.parallel()).toBe(Schedulers.parallel());
    });

    it('a pool needs at least one context', () => {
        expect(() => new TimerScheduler('empty', 0)).toThrow('size >= 1 required but it was 0');
    });

    it('hands out workers round-robin over the pool', () => {
        const s = scheduler('pool', 2);
        expect([s.createWorker().name, s.createWorker().name, s.createWorker().name]).toEqual(['pool-1', 'pool-2', 'pool-1']);
    });

    it('runs worker tasks in their context, in order', async () => {
        const w = scheduler('ctx', 1).createWorker();
        const seen: string[] = [];
        await new Promise<void>(resolve => {
            w.schedule(() => { seen.push('a@' + Schedulers.currentContextName()); });
            w.schedule(() => {
                seen.push('b@' + Schedulers.currentContextName());
                resolve();
            });
        });
        expect(seen).toEqual(['a@ctx-1', 'b@ctx-1']);
        expect(Schedulers.currentContextName()).toBe('main');
    });

    it('a shut-down worker rejects new tasks and drops pending ones', async () => {
        const w = scheduler('stop', 1).createWorker();
        let ran = false;
        w.scheduleDelayed(() => { ran = true; }, 5);
        w.shutdown();
        expect(w.schedule(() => { ran = true; })).toBe(Disposables.REJECTED);
        await new Promise(resolve => setTimeout(resolve, 20));
        expect(ran).toBe(false);
    });

    it('periodic tasks repeat until disposed', async () => {
        const w = scheduler('tick', 1).createWorker();
        let ticks = 0;
        await new Promise<void>(resolve => {
            const d = w.schedulePeriodic(() => {
                if (++ticks == 3) {
                    d.dispose();
                    resolve();
                }
            }, 1, 1);
        });
        await new Promise(resolve => setTimeout(resolve, 10));
        expect(ticks).toBe(3);
    });

    it('routes a throwing task to the dropped-error hook', () => {
        const dropped: string[] = [];
        Hooks.onErrorDropped(e => { dropped.push(e.message); });
        runInContext('test', () => { throw new Error('task failed'); });
        expect(dropped).toEqual(['task failed']);
    });
});
