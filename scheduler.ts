import * as flow from './flow';
import { getConfig } from './config';
import { Exceptions } from './errors';
import { Hooks } from './hooks';

/** Provides an abstract asychronous boundary to operators. */
export interface Scheduler {
    readonly name: string;

    schedule(task: () => void) : flow.Disposable;

    createWorker() : Worker;

    /** Cancels every outstanding task of this scheduler and of the workers it created. */
    dispose() : void;
}

/**
 * A worker representing an asynchronous boundary that executes tasks in
 * a FIFO order, guaranteed non-concurrently with respect to each other.
 */
export interface Worker {
    readonly name: string;

    schedule(task: () => void) : flow.Disposable;

    shutdown() : void;

    isShutdown() : boolean;
}

export interface TimedScheduler extends Scheduler {

    /** The scheduler's notion of the current time in milliseconds. */
    now() : number;

    scheduleDelayed(task: () => void, delay: number) : flow.Disposable;

    schedulePeriodic(task: () => void, initialDelay: number, period: number) : flow.Disposable;

    createWorker() : TimedWorker;
}

export interface TimedWorker extends Worker {

    scheduleDelayed(task: () => void, delay: number) : flow.Disposable;

    schedulePeriodic(task: () => void, initialDelay: number, period: number) : flow.Disposable;
}

// ----------------------------------------------------------------------

const MAIN_CONTEXT = "main";

let currentContext = MAIN_CONTEXT;

/** Runs a task as the given execution context; a throwing task is reported to Hooks. */
export function runInContext(name: string, task: () => void) : void {
    const prev = currentContext;
    currentContext = name;
    try {
        task();
    } catch (ex) {
        Hooks.errorDropped(Exceptions.propagate(ex));
    } finally {
        currentContext = prev;
    }
}

// ----------------------------------------------------------------------

class ImmediateWorker implements Worker {
    private mShutdown = false;

    constructor(readonly name: string) {

    }

    schedule(task: () => void) : flow.Disposable {
        if (this.mShutdown) {
            return flow.Disposables.REJECTED;
        }
        task();
        return flow.Disposables.DISPOSED;
    }

    shutdown() : void {
        this.mShutdown = true;
    }

    isShutdown() : boolean {
        return this.mShutdown;
    }
}

/** Runs tasks on the caller, in the caller's context. */
class ImmediateScheduler implements Scheduler {
    static readonly INSTANCE = new ImmediateScheduler();

    readonly name = "immediate";

    schedule(task: () => void) : flow.Disposable {
        task();
        return flow.Disposables.DISPOSED;
    }

    createWorker() : Worker {
        return new ImmediateWorker(this.name);
    }

    dispose() : void {
        // nothing to release
    }
}

// ----------------------------------------------------------------------

type TimerHandle = ReturnType<typeof setTimeout>;

/** A worker backed by Node timers; tasks run one at a time, in scheduling order. */
class TimerWorker implements TimedWorker {
    private mShutdown : boolean;

    private mTasks : Set<TimerHandle>;

    constructor(readonly name: string, private onShutdown: (w: TimerWorker) => void) {
        this.mShutdown = false;
        this.mTasks = new Set<TimerHandle>();
    }

    schedule(task: () => void) : flow.Disposable {
        return this.scheduleDelayed(task, 0);
    }

    scheduleDelayed(task: () => void, delay: number) : flow.Disposable {
        if (this.mShutdown) {
            return flow.Disposables.REJECTED;
        }

        const wt = new WorkerTask(this, task);

        const id = setTimeout(wt.run, Math.max(0, delay));
        this.mTasks.add(id);
        wt.id = id;

        return wt;
    }

    schedulePeriodic(task: () => void, initialDelay: number, period: number) : flow.Disposable {
        if (this.mShutdown) {
            return flow.Disposables.REJECTED;
        }

        const wt = new WorkerPeriodicTask(this, task);

        const initialId = setTimeout(() => {
            this.remove(initialId);
            wt.initialId = undefined;

            this.run(task);

            if (!wt.isDisposed() && !this.mShutdown) {
                const periodId = setInterval(wt.run, period);
                this.mTasks.add(periodId);
                wt.periodId = periodId;
            }
        }, Math.max(0, initialDelay));
        this.mTasks.add(initialId);
        wt.initialId = initialId;

        return wt;
    }

    run(task: () => void) : void {
        runInContext(this.name, task);
    }

    shutdown() : void {
        if (!this.mShutdown) {
            this.mShutdown = true;
            for (const n of this.mTasks) {
                clearTimeout(n);
                clearInterval(n);
            }
            this.mTasks.clear();
            this.onShutdown(this);
        }
    }

    isShutdown() : boolean {
        return this.mShutdown;
    }

    remove(id: TimerHandle | undefined) : void {
        if (id !== undefined) {
            this.mTasks.delete(id);
        }
    }
}

class WorkerTask implements flow.Disposable {
    id : TimerHandle | undefined;

    private mDisposed = false;

    constructor(private mParent: TimerWorker, private mTask: () => void) {

    }

    run = () : void => {
        this.mParent.remove(this.id);
        if (!this.mDisposed) {
            this.mDisposed = true;
            this.mParent.run(this.mTask);
        }
    }

    dispose() : void {
        if (!this.mDisposed) {
            this.mDisposed = true;
            clearTimeout(this.id);
            this.mParent.remove(this.id);
        }
    }
}

class WorkerPeriodicTask implements flow.Disposable {
    initialId : TimerHandle | undefined;

    periodId : TimerHandle | undefined;

    private mDisposed = false;

    constructor(private mParent: TimerWorker, private mTask: () => void) {

    }

    run = () : void => {
        if (!this.mDisposed) {
            this.mParent.run(this.mTask);
        }
    }

    isDisposed() : boolean {
        return this.mDisposed;
    }

    dispose() : void {
        this.mDisposed = true;
        if (this.initialId !== undefined) {
            clearTimeout(this.initialId);
            this.mParent.remove(this.initialId);
            this.initialId = undefined;
        }
        if (this.periodId !== undefined) {
            clearInterval(this.periodId);
            this.mParent.remove(this.periodId);
            this.periodId = undefined;
        }
    }
}

/**
 * A pool of `size` timer-backed execution contexts named `<name>-1` ... `<name>-size`.
 * Workers are handed out round-robin over the pool.
 */
export class TimerScheduler implements TimedScheduler {
    private slots : TimerWorker[];

    private workers : Set<TimerWorker>;

    private index : number;

    constructor(readonly name: string, private size: number) {
        if (size < 1) {
            throw new Error("size >= 1 required but it was " + size);
        }
        this.workers = new Set<TimerWorker>();
        this.slots = [];
        for (let i = 0; i < size; i++) {
            this.slots.push(new TimerWorker(`${name}-${i + 1}`, w => this.workers.delete(w)));
        }
        this.index = 0;
    }

    now() : number {
        return Date.now();
    }

    private nextSlot() : TimerWorker {
        const s = this.slots[this.index];
        this.index = (this.index + 1) % this.size;
        return s;
    }

    schedule(task: () => void) : flow.Disposable {
        return this.nextSlot().schedule(task);
    }

    scheduleDelayed(task: () => void, delay: number) : flow.Disposable {
        return this.nextSlot().scheduleDelayed(task, delay);
    }

    schedulePeriodic(task: () => void, initialDelay: number, period: number) : flow.Disposable {
        return this.nextSlot().schedulePeriodic(task, initialDelay, period);
    }

    createWorker() : TimedWorker {
        const w = new TimerWorker(this.nextSlot().name, x => this.workers.delete(x));
        this.workers.add(w);
        return w;
    }

    dispose() : void {
        for (const w of Array.from(this.workers)) {
            w.shutdown();
        }
        for (const s of this.slots) {
            s.shutdown();
        }
        this.slots = [];
        for (let i = 0; i < this.size; i++) {
            this.slots.push(new TimerWorker(`${this.name}-${i + 1}`, w => this.workers.delete(w)));
        }
    }
}

// ----------------------------------------------------------------------

/** Factory and registry of the shared schedulers. */
export class Schedulers {
    private static SINGLE : TimedScheduler | null = null;

    private static PARALLEL : TimedScheduler | null = null;

    /** Runs work on the caller. */
    static immediate() : Scheduler {
        return ImmediateScheduler.INSTANCE;
    }

    /** One shared execution context. */
    static single() : TimedScheduler {
        if (Schedulers.SINGLE == null) {
            Schedulers.SINGLE = new TimerScheduler("single", 1);
        }
        return Schedulers.SINGLE;
    }

    /** A shared pool of `parallelism` execution contexts. */
    static parallel() : TimedScheduler {
        if (Schedulers.PARALLEL == null) {
            Schedulers.PARALLEL = new TimerScheduler("parallel", getConfig().parallelism);
        }
        return Schedulers.PARALLEL;
    }

    static newSingle(name: string) : TimedScheduler {
        return new TimerScheduler(name, 1);
    }

    static newParallel(name: string, parallelism?: number) : TimedScheduler {
        return new TimerScheduler(name, parallelism === undefined ? getConfig().parallelism : parallelism);
    }

    /** The name of the worker running the current task, or `main` outside of any worker. */
    static currentContextName() : string {
        return currentContext;
    }
}
