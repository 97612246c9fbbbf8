/**
 * Download queue - library entry point
 */

// Core
export * from './core/types';
export * from './core/errors';
export { applyTransition, canTransition, isActive, isTerminal } from './core/JobStateMachine';
export type { JobTransition } from './core/JobStateMachine';
export { ExecutionController, DEFAULT_CONTROLLER_OPTIONS } from './core/ExecutionController';
export type { ExecutionControllerDeps } from './core/ExecutionController';
export { ProgressThrottle, RateMeter } from './core/ProgressThrottle';
export { JobQueue } from '../queue/JobQueue';

// Throttling
export { RateLimiter, assertValidRate } from './throttle/RateLimiter';

// Engines
export { BaseEngine } from './engines/BaseEngine';
export { HttpEngine } from './engines/HttpEngine';
export { YtDlpEngine } from './engines/YtDlpEngine';
export { createEngine } from './engines';

// Sinks
export { LoggingProgressSink, CompositeProgressSink } from './sinks/LoggingProgressSink';
export { ConsoleProgressSink } from './sinks/ConsoleProgressSink';
export { EventBus, QueueEvents } from '../utils/EventBus';

// Storage
export { HistoryStore } from '../storage/HistoryStore';
export { SettingsStore } from '../storage/SettingsStore';
export { FileCheckpointStore } from '../storage/CheckpointStore';

// Quality
export * from './quality/presets';
