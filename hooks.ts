import { createLogger, type Logger } from './logger';

/**
 * Last-resort routing for signals that can no longer be delivered: errors
 * arriving after a terminal signal, and errors thrown by consumer callbacks.
 * By default they are logged; tests may install their own consumer.
 */
export class Hooks {
    private static logger : Logger | null = null;

    private static errorHook : ((e: Error) => void) | null = null;

    private static nextHook : ((t: unknown) => void) | null = null;

    private static log() : Logger {
        if (Hooks.logger == null) {
            Hooks.logger = createLogger('reactor.Hooks');
        }
        return Hooks.logger;
    }

    static errorDropped(e: Error) : void {
        const h = Hooks.errorHook;
        if (h != null) {
            h(e);
        } else {
            Hooks.log().error({ err: e }, 'Operator called default onErrorDropped');
        }
    }

    static nextDropped(t: unknown) : void {
        const h = Hooks.nextHook;
        if (h != null) {
            h(t);
        } else {
            Hooks.log().debug({ value: t }, 'onNextDropped');
        }
    }

    static onErrorDropped(hook: (e: Error) => void) : void {
        Hooks.errorHook = hook;
    }

    static onNextDropped(hook: (t: unknown) => void) : void {
        Hooks.nextHook = hook;
    }

    static resetOnErrorDropped() : void {
        Hooks.errorHook = null;
    }

    static resetOnNextDropped() : void {
        Hooks.nextHook = null;
    }
}
