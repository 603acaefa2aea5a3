/**
 * Time and process info port.
 *
 * Used for lock file metadata and stale-lock checks; keeps Date/process
 * globals out of adapters that tests construct directly.
 */
export interface TimeClockPort {
  /** Unix timestamp in milliseconds. */
  nowMs(): number;

  /** Process ID written into the lock file. */
  getPid(): number;

  /** False only when no process with `pid` exists on this host. */
  isProcessAlive(pid: number): boolean;
}
