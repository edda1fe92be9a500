import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { afterEach } from 'vitest';

/**
 * Create a test context with auto-cleanup.
 * Provides temp dirs and an abort signal.
 * All resources are cleaned up automatically in afterEach.
 */
export function testContext() {
  let abortController = new AbortController();
  const tempDirs: string[] = [];

  afterEach(() => {
    abortController.abort();
    abortController = new AbortController();
    for (const dir of tempDirs.splice(0)) {
      try {
        rmSync(dir, { recursive: true, force: true });
      } catch {
        // EBUSY on Windows — a killed child may still hold locks. Ignore.
      }
    }
  });

  return {
    get signal(): AbortSignal {
      return abortController.signal;
    },
    createTempDir(): string {
      const dir = mkdtempSync(join(tmpdir(), 'stepseq-test-'));
      tempDirs.push(dir);
      return dir;
    },
  };
}
