import { describe, it, expect } from 'vitest';
import { INTERRUPT_SIGNALS, listenForInterrupts } from '../../src/cli/interrupts.js';
import {
  TerminationRequested,
  ThrowingProcessTerminator,
} from '../../src/runtime/adapters/throwing-process-terminator.js';
import { createSilentLogger } from '../../src/core/logging/index.js';
import { RecordingProcessSignals } from '../fakes/process-signals.fake.js';

describe('listenForInterrupts', () => {
  const setup = () => {
    const signals = new RecordingProcessSignals();
    const signal = listenForInterrupts(signals, new ThrowingProcessTerminator(), createSilentLogger());
    return { signals, signal };
  };

  it('listens for SIGINT, SIGTERM and SIGHUP once each', () => {
    const { signals } = setup();

    expect(INTERRUPT_SIGNALS).toEqual(['SIGINT', 'SIGTERM', 'SIGHUP']);
    expect(INTERRUPT_SIGNALS.map((name) => signals.count(name))).toEqual([1, 1, 1]);
  });

  it('aborts on the first signal and records which one it was', () => {
    const { signals, signal } = setup();
    expect(signal.aborted).toBe(false);

    signals.emit('SIGTERM');

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBe('SIGTERM');
  });

  it('terminates with a failure on a second signal', () => {
    const { signals } = setup();
    signals.emit('SIGINT');

    let thrown: unknown;
    try {
      signals.emit('SIGINT');
    } catch (e) {
      thrown = e;
    }

    expect(thrown).toBeInstanceOf(TerminationRequested);
    if (thrown instanceof TerminationRequested) expect(thrown.termination).toEqual({ kind: 'failure' });
  });
});
