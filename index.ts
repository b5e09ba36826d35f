export type { Publisher, Subscriber, Subscription, Processor } from './reactive-streams';
export type { Disposable } from './flow';
export { Flux, DirectProcessor, UnicastProcessor, GroupedFlux, naturalOrder } from './flux';
export { Mono } from './mono';
export { LambdaSubscriber, SubscriberState } from './subscriber';
export { Schedulers, type Scheduler, type Worker, type TimedScheduler, type TimedWorker } from './scheduler';
export { VirtualTimeScheduler } from './virtual-time-scheduler';
export { StepVerifier } from './step-verifier';
export { MonoFluxOperations } from './mono-flux-operations';
export { runDemo, EXAMPLE_NAMES, type DemoEntry, type DemoOptions } from './main';
export { Signals, format, type Signal, type SignalKind } from './signal';
export {
    StreamError, ComputationError, TimeoutError, UpstreamError,
    StepVerificationError, ConfigError, Exceptions, ERROR_KINDS, type ErrorKind,
} from './errors';
export type { ErrorDispatchTable, ErrorResumeHandler } from './flux-error';
export type { LifecycleCallbacks } from './flux-lifecycle';
export { Hooks } from './hooks';
export { loadConfig, getConfig, configSchema, type ReactorConfig, type LogLevel } from './config';
export { createLogger, type Logger } from './logger';
