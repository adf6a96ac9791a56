// module entry point

// RappManager - Full export from rapp-manager module
export * from './lib/rapp-manager/index';

// Logging
export * from './lib/logger/index';

// Event handling
export {
  EventEmitter,
  EventEmitterProtected,
  type EventCallback,
  type EventEmitterOptions,
  type ListenerErrorHandler,
} from './lib/event-emitter';

// Utility functions
export { sleep } from './lib/sleep';
export { isPromise } from './lib/is-promise';
export { interpolate } from './lib/interpolate';
export { errorToString } from './lib/error-to-string';
