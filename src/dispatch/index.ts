/**
 * @module dispatch
 */

export { Dispatcher, createDispatcher, buildUrl } from './dispatcher.js';
export type { DispatcherOptions, SendOptions, DispatchResult } from './dispatcher.js';
export { systemClock, fixedClock } from './clock.js';
export type { Clock } from './clock.js';
