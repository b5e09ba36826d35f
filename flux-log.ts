import * as rs from './reactive-streams';
import { createLogger, type Logger } from './logger';
import { format } from './signal';
import type { LifecycleCallbacks } from './flux-lifecycle';

/**
 * Callbacks that write every signal, request and cancellation passing through
 * to a category logger at `info` level, one line per event:
 *
 * ```
 * onSubscribe(FluxRangeSubscription)
 * request(unbounded)
 * onNext(5)
 * onComplete()
 * ```
 */
export function signalLogger<T>(category: string, parent?: Logger) : LifecycleCallbacks<T> {
    const logger = createLogger(category, parent);
    return {
        onSubscribe: (s: rs.Subscription) => logger.info(`onSubscribe(${s.constructor.name})`),
        onNext: (t: T) => logger.info(`onNext(${format(t)})`),
        onError: (e: Error) => logger.error({ err: e }, `onError(${format(e)})`),
        onComplete: () => logger.info('onComplete()'),
        onRequest: (n: number) => logger.info(`request(${n == Infinity ? 'unbounded' : n})`),
        onCancel: () => logger.info('cancel()'),
    };
}
