import pino from 'pino';
import { getConfig } from './config';

export type Logger = pino.Logger;

let base : Logger | null = null;

function baseLogger() : Logger {
    if (base == null) {
        base = pino({
            name: 'reactor',
            level: getConfig().logLevel,
            messageKey: 'msg',
            timestamp: pino.stdTimeFunctions.isoTime,
            serializers: {
                err: pino.stdSerializers.err,
            },
        });
    }
    return base;
}

/** A child logger tagged with the given category, e.g. `reactor.Flux.Range.1`. */
export function createLogger(category: string, parent?: Logger) : Logger {
    return (parent ?? baseLogger()).child({ category });
}
