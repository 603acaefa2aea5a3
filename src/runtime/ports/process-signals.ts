/**
 * Signals that ask texloop to stop. Each one aborts the current run so the
 * workspace lock is released on the way out.
 */
export type InterruptSignal = 'SIGINT' | 'SIGTERM' | 'SIGHUP';

/**
 * Port for registering process signal handlers.
 * Keeps `process.on` out of everything but the adapter.
 */
export interface ProcessSignals {
  on(signal: InterruptSignal, handler: () => void): void;
}
