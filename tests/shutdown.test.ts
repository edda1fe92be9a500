import { describe, it, expect, beforeEach } from 'vitest';
import {
  handleInterrupt,
  isShuttingDown,
  setCurrentAbort,
  resetShutdownState,
} from '../src/sequencer/shutdown.js';

beforeEach(() => {
  resetShutdownState();
});

describe('handleInterrupt', () => {
  it('exits right away when no run is active', () => {
    expect(handleInterrupt()).toBe('exit');
    expect(isShuttingDown()).toBe(false);
  });

  it('stops after the current step, then aborts it', () => {
    const controller = new AbortController();
    setCurrentAbort(controller);

    expect(handleInterrupt()).toBe('stop-after-step');
    expect(isShuttingDown()).toBe(true);
    expect(controller.signal.aborted).toBe(false);

    expect(handleInterrupt()).toBe('abort');
    expect(controller.signal.aborted).toBe(true);
  });
});
