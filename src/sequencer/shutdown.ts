/**
 * Graceful shutdown handler.
 *
 * - First Ctrl+C: stop after the current step, skip the rest
 * - Second Ctrl+C: abort the current step and exit
 */

let _isShuttingDown = false;
let _currentAbort: AbortController | null = null;
let _sigintCount = 0;
let _installed = false;

/** Whether shutdown has been requested */
export function isShuttingDown(): boolean {
  return _isShuttingDown;
}

/** Register the run's AbortController for force-quit */
export function setCurrentAbort(controller: AbortController | null): void {
  _currentAbort = controller;
}

/** Handle one SIGINT. Returns what the process should do next. */
export function handleInterrupt(): 'exit' | 'stop-after-step' | 'abort' {
  _sigintCount++;

  if (_sigintCount === 1) {
    if (!_currentAbort) return 'exit';
    _isShuttingDown = true;
    return 'stop-after-step';
  }

  _currentAbort?.abort();
  return 'abort';
}

/** Install signal handlers. Safe to call multiple times (idempotent). */
export function installShutdownHandlers(): void {
  if (_installed) return;
  _installed = true;

  process.on('SIGINT', () => {
    switch (handleInterrupt()) {
      case 'exit':
        process.exit(130);
        break;
      case 'stop-after-step':
        console.log('\n⏸ Stopping after the current step completes...');
        console.log('  Press Ctrl+C again to abort it.\n');
        break;
      case 'abort':
        console.log('\n⚡ Aborting current step.');
        // Give the child a moment to exit, then force exit
        setTimeout(() => process.exit(1), 3000).unref();
        break;
    }
  });
}

/** Reset shutdown state (for testing) */
export function resetShutdownState(): void {
  _isShuttingDown = false;
  _currentAbort = null;
  _sigintCount = 0;
}
