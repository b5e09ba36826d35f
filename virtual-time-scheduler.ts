import * as flow from './flow';
import * as sch from './scheduler';

class VirtualTask implements flow.Disposable {
    disposed = false;

    constructor(readonly time: number, readonly seq: number, readonly context: string,
            readonly task: () => void, private owner: VirtualTimeScheduler) {

    }

    dispose() : void {
        if (!this.disposed) {
            this.disposed = true;
            this.owner.remove(this);
        }
    }
}

class VirtualPeriodicTask implements flow.Disposable {
    current : flow.Disposable | null = null;

    disposed = false;

    dispose() : void {
        this.disposed = true;
        const c = this.current;
        this.current = null;
        if (c != null) {
            c.dispose();
        }
    }
}

/**
 * A scheduler driven by a logical clock. Tasks never run on their own: they
 * run when the clock is advanced past their due time, ordered by due time and,
 * for equal due times, by the order they were scheduled in. Tasks due at or
 * before the current time run as soon as they are scheduled.
 */
export class VirtualTimeScheduler implements sch.TimedScheduler {
    private queue : VirtualTask[] = [];

    private clock = 0;

    private deadline = 0;

    private seq = 0;

    private draining = false;

    private workerCount = 0;

    private workers = new Set<VirtualWorker>();

    private constructor(readonly name: string) {

    }

    static create(name: string = "virtual") : VirtualTimeScheduler {
        return new VirtualTimeScheduler(name);
    }

    now() : number {
        return this.clock;
    }

    schedule(task: () => void) : flow.Disposable {
        return this.enqueue(task, 0, this.name);
    }

    scheduleDelayed(task: () => void, delay: number) : flow.Disposable {
        return this.enqueue(task, delay, this.name);
    }

    schedulePeriodic(task: () => void, initialDelay: number, period: number) : flow.Disposable {
        return this.enqueuePeriodic(task, initialDelay, period, this.name);
    }

    createWorker() : sch.TimedWorker {
        const w = new VirtualWorker(`${this.name}-${++this.workerCount}`, this);
        this.workers.add(w);
        return w;
    }

    /** Moves the clock forward by `ms`, running every task that becomes due. */
    advanceTimeBy(ms: number) : void {
        this.advanceTimeTo(this.deadline + Math.max(0, ms));
    }

    /** Moves the clock to `time` (never backwards), running every task that becomes due. */
    advanceTimeTo(time: number) : void {
        if (time > this.deadline) {
            this.deadline = time;
        }
        this.drain();
    }

    hasPendingTasks() : boolean {
        return this.queue.length != 0;
    }

    dispose() : void {
        for (const w of Array.from(this.workers)) {
            w.shutdown();
        }
        const q = this.queue;
        this.queue = [];
        for (const t of q) {
            t.disposed = true;
        }
    }

    enqueue(task: () => void, delay: number, context: string) : VirtualTask {
        const t = new VirtualTask(this.clock + Math.max(0, delay), this.seq++, context, task, this);
        const q = this.queue;
        let i = q.length;
        while (i > 0 && q[i - 1].time > t.time) {
            i--;
        }
        q.splice(i, 0, t);
        this.drain();
        return t;
    }

    enqueuePeriodic(task: () => void, initialDelay: number, period: number, context: string) : flow.Disposable {
        const pt = new VirtualPeriodicTask();
        const run = () => {
            if (pt.disposed) {
                return;
            }
            pt.current = this.enqueue(run, period, context);
            task();
        };
        pt.current = this.enqueue(run, initialDelay, context);
        return pt;
    }

    remove(t: VirtualTask) : void {
        const idx = this.queue.indexOf(t);
        if (idx >= 0) {
            this.queue.splice(idx, 1);
        }
    }

    private drain() : void {
        if (this.draining) {
            return;
        }
        this.draining = true;
        try {
            for (;;) {
                const t = this.queue[0];
                if (t === undefined || t.time > this.deadline) {
                    break;
                }
                this.queue.shift();
                if (t.time > this.clock) {
                    this.clock = t.time;
                }
                t.disposed = true;
                sch.runInContext(t.context, t.task);
            }
            if (this.deadline > this.clock) {
                this.clock = this.deadline;
            }
        } finally {
            this.draining = false;
        }
    }

    workerShutdown(w: VirtualWorker) : void {
        this.workers.delete(w);
    }
}

class VirtualWorker implements sch.TimedWorker {
    private tasks = new Set<flow.Disposable>();

    private mShutdown = false;

    constructor(readonly name: string, private parent: VirtualTimeScheduler) {

    }

    private track(d: flow.Disposable) : flow.Disposable {
        this.tasks.add(d);
        return {
            dispose: () => {
                this.tasks.delete(d);
                d.dispose();
            }
        };
    }

    schedule(task: () => void) : flow.Disposable {
        return this.scheduleDelayed(task, 0);
    }

    scheduleDelayed(task: () => void, delay: number) : flow.Disposable {
        if (this.mShutdown) {
            return flow.Disposables.REJECTED;
        }
        let d : flow.Disposable | null = null;
        const t = this.parent.enqueue(() => {
            if (d != null) {
                this.tasks.delete(d);
            }
            task();
        }, delay, this.name);
        if (t.disposed) {
            return t;
        }
        d = t;
        return this.track(t);
    }

    schedulePeriodic(task: () => void, initialDelay: number, period: number) : flow.Disposable {
        if (this.mShutdown) {
            return flow.Disposables.REJECTED;
        }
        return this.track(this.parent.enqueuePeriodic(task, initialDelay, period, this.name));
    }

    shutdown() : void {
        if (!this.mShutdown) {
            this.mShutdown = true;
            for (const d of Array.from(this.tasks)) {
                d.dispose();
            }
            this.tasks.clear();
            this.parent.workerShutdown(this);
        }
    }

    isShutdown() : boolean {
        return this.mShutdown;
    }
}
