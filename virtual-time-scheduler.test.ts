import { describe, it, expect } from 'vitest';
import { VirtualTimeScheduler } from './virtual-time-scheduler';
import { Disposables } from './flow';

describe('VirtualTimeScheduler', () => {
    it('runs delayed tasks only when the clock reaches them', () => {
        const vts = VirtualTimeScheduler.create();
        const ran: string[] = [];
        vts.scheduleDelayed(() => { ran.push('b'); }, 20);
        vts.scheduleDelayed(() => { ran.push('a'); }, 10);

        vts.advanceTimeBy(9);
        expect(ran).toEqual([]);
        expect(vts.now()).toBe(9);

        vts.advanceTimeBy(1);
        expect(ran).toEqual(['a']);

        vts.advanceTimeBy(100);
        expect(ran).toEqual(['a', 'b']);
        expect(vts.now()).toBe(110);
        expect(vts.hasPendingTasks()).toBe(false);
    });

    it('runs tasks due at the same time in scheduling order', () => {
        const vts = VirtualTimeScheduler.create();
        const ran: number[] = [];
        for (let i = 0; i < 3; i++) {
            vts.scheduleDelayed(() => { ran.push(i); }, 5);
        }
        vts.advanceTimeTo(5);
        expect(ran).toEqual([0, 1, 2]);
    });

    it('runs an undelayed task right away', () => {
        const vts = VirtualTimeScheduler.create();
        let ran = false;
        vts.schedule(() => { ran = true; });
        expect(ran).toBe(true);
    });

    it('exposes the clock to tasks as their due time', () => {
        const vts = VirtualTimeScheduler.create();
        const times: number[] = [];
        vts.scheduleDelayed(() => { times.push(vts.now()); }, 30);
        vts.scheduleDelayed(() => { times.push(vts.now()); }, 70);
        vts.advanceTimeBy(100);
        expect(times).toEqual([30, 70]);
    });

    it('never moves the clock backwards', () => {
        const vts = VirtualTimeScheduler.create();
        vts.advanceTimeTo(50);
        vts.advanceTimeTo(10);
        expect(vts.now()).toBe(50);
    });

    it('repeats periodic tasks until disposed', () => {
        const vts = VirtualTimeScheduler.create();
        let ticks = 0;
        const d = vts.schedulePeriodic(() => { ticks++; }, 10, 10);
        vts.advanceTimeBy(35);
        expect(ticks).toBe(3);
        d.dispose();
        vts.advanceTimeBy(100);
        expect(ticks).toBe(3);
    });

    it('a disposed task does not run', () => {
        const vts = VirtualTimeScheduler.create();
        let ran = false;
        const d = vts.scheduleDelayed(() => { ran = true; }, 10);
        d.dispose();
        vts.advanceTimeBy(10);
        expect(ran).toBe(false);
    });

    it('shutting a worker down cancels its pending tasks only', () => {
        const vts = VirtualTimeScheduler.create();
        const ran: string[] = [];
        const w1 = vts.createWorker();
        const w2 = vts.createWorker();
        w1.scheduleDelayed(() => { ran.push('w1'); }, 10);
        w2.scheduleDelayed(() => { ran.push('w2'); }, 10);
        w1.shutdown();
        expect(w1.isShutdown()).toBe(true);
        expect(w1.scheduleDelayed(() => { ran.push('late'); }, 1)).toBe(Disposables.REJECTED);
        vts.advanceTimeBy(10);
        expect(ran).toEqual(['w2']);
    });

    it('names workers after the scheduler', () => {
        const vts = VirtualTimeScheduler.create('vt');
        expect(vts.createWorker().name).toBe('vt-1');
        expect(vts.createWorker().name).toBe('vt-2');
    });

    it('dispose drops every pending task', () => {
        const vts = VirtualTimeScheduler.create();
        let ran = false;
        vts.scheduleDelayed(() => { ran = true; }, 10);
        vts.dispose();
        vts.advanceTimeBy(10);
        expect(ran).toBe(false);
        expect(vts.hasPendingTasks()).toBe(false);
    });
});
