/** One event of a sequence: a value, an error or completion. */
export type Signal<T> =
    | { readonly kind: 'next'; readonly value: T }
    | { readonly kind: 'error'; readonly error: Error }
    | { readonly kind: 'complete' };

export type SignalKind = Signal<unknown>['kind'];

export const Signals = {
    next<T>(value: T) : Signal<T> {
        return { kind: 'next', value };
    },

    error<T = never>(error: Error) : Signal<T> {
        return { kind: 'error', error };
    },

    complete<T = never>() : Signal<T> {
        return COMPLETE;
    },

    isTerminal(signal: Signal<unknown>) : boolean {
        return signal.kind !== 'next';
    },

    describe(signal: Signal<unknown>) : string {
        switch (signal.kind) {
            case 'next':
                return `onNext(${format(signal.value)})`;
            case 'error':
                return `onError(${signal.error.name}: ${signal.error.message})`;
            case 'complete':
                return 'onComplete()';
        }
    },
};

const COMPLETE : Signal<never> = { kind: 'complete' };

/** Renders a value the way log lines and assertion messages show it. */
export function format(value: unknown) : string {
    if (Array.isArray(value)) {
        return '[' + value.map(format).join(', ') + ']';
    }
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'bigint') {
        return value.toString();
    }
    if (value instanceof Error) {
        return `${value.name}: ${value.message}`;
    }
    if (value !== null && typeof value === 'object') {
        return JSON.stringify(value);
    }
    return String(value);
}
