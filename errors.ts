/**
 * Error taxonomy of the runtime.
 *
 * Every error a sequence terminates with is classified by a `kind` tag, so
 * fallback operators can dispatch on it through a table instead of inspecting
 * classes. Errors that carry no tag (a plain `Error` handed to `Flux.error`,
 * say) are classified as `upstream`.
 */

export type ErrorKind = 'computation' | 'timeout' | 'upstream';

export const ERROR_KINDS: readonly ErrorKind[] = ['computation', 'timeout', 'upstream'];

export abstract class StreamError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** A user-supplied function (mapper, predicate, combiner, ...) threw or returned null. */
export class ComputationError extends StreamError {
    readonly kind = 'computation' as const;

    /** Wraps whatever a user function threw; errors that are already classified pass through. */
    static wrap(ex: unknown): StreamError {
        if (ex instanceof StreamError) {
            return ex;
        }
        if (ex instanceof Error) {
            return new ComputationError(ex.message, { cause: ex });
        }
        return new ComputationError(String(ex), { cause: ex });
    }
}

/** No item or terminal signal arrived within the configured bound. */
export class TimeoutError extends StreamError {
    readonly kind = 'timeout' as const;

    constructor(readonly timeoutMs: number, message?: string) {
        super(message ?? `Did not observe any item or terminal signal within ${timeoutMs}ms (and no fallback has been configured)`);
    }
}

/** A source failed on its own. */
export class UpstreamError extends StreamError {
    readonly kind = 'upstream' as const;
}

/** Raised by the StepVerifier when the observed signals differ from the script. */
export class StepVerificationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'StepVerificationError';
    }
}

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

export class Exceptions {
    static isStreamError(error: unknown): error is StreamError {
        return error instanceof StreamError;
    }

    static kindOf(error: Error): ErrorKind {
        return Exceptions.isStreamError(error) ? error.kind : 'upstream';
    }

    /** Turns anything thrown by a source into an Error, tagging non-errors as upstream failures. */
    static propagate(ex: unknown): Error {
        if (ex instanceof Error) {
            return ex;
        }
        return new UpstreamError(String(ex), { cause: ex });
    }

    /** Combines two errors that terminated the same sequence. */
    static combine(current: Error | null, next: Error): Error {
        if (current == null) {
            return next;
        }
        if (current instanceof AggregateError) {
            return new AggregateError([...current.errors, next], 'Multiple errors');
        }
        return new AggregateError([current, next], 'Multiple errors');
    }

    static nullValue(what: string): ComputationError {
        return new ComputationError(`${what} returned a null value`);
    }

    static lackOfRequests(what: string): UpstreamError {
        return new UpstreamError(`Could not emit ${what} due to lack of requests`);
    }
}
