import type { TimeClockPort } from '../../../ports/time-clock.port.js';
import { nodeErrorCode } from '../fs/index.js';

/** Wall clock and pid of the running process. */
export class ProcessClock implements TimeClockPort {
  nowMs = (): number => Date.now();
  getPid = (): number => process.pid;

  isProcessAlive = (pid: number): boolean => {
    try {
      // Signal 0 checks for existence without delivering anything.
      process.kill(pid, 0);
      return true;
    } catch (e) {
      // EPERM: it exists but belongs to someone else.
      return nodeErrorCode(e) !== 'ESRCH';
    }
  };
}
